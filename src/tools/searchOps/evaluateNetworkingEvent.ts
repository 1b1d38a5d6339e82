import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "evaluate_networking_event";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => evaluateNetworkingEvent(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Evaluate whether to attend a networking event", deps.schemaDir)
  );
}

export async function evaluateNetworkingEvent(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const eventId = args.stringValue("event_id");

  const [event, historicalFeedback, preferences] = await Promise.all([
    provider.getEventContext(eventId),
    provider.getEventFeedbackSummary(),
    provider.getPreferencesContext()
  ]);

  return contextResult(
    {
      event_id: eventId,
      event,
      historical_feedback: historicalFeedback,
      preferences
    },
    instructionLines(
      "Evaluate this event for attendance value.",
      "Consider: relevance to target sectors, expected networking value, time investment, historical outcomes from similar events.",
      "Return JSON with: recommendation (strong_yes/yes/maybe/skip), rationale, expected_value, concerns (array), preparation_tips."
    )
  );
}
