import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "debrief_event";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => debriefEvent(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Process event debrief and generate follow-up actions", deps.schemaDir)
  );
}

export async function debriefEvent(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const eventId = args.stringValue("event_id");
  // non-object entries are kept as {} so positions line up with what the model sent
  const contactsMade = args.objectArray("contacts_made");
  const rating = args.int("rating") ?? 3;
  const wouldRecommend = args.bool("would_recommend") ?? false;

  const event = await provider.getEventContext(eventId);

  return contextResult(
    {
      event_id: eventId,
      event,
      contacts_made: contactsMade,
      rating,
      would_recommend: wouldRecommend,
      what_worked: args.string("what_worked") ?? "",
      what_didnt_work: args.string("what_didnt_work") ?? "",
      notes: args.string("notes") ?? ""
    },
    instructionLines(
      "Process this event debrief and generate follow-up actions.",
      "Return JSON with:",
      "- summary: Brief summary of the event outcome",
      "- follow_up_actions: Array of {contact_name, action, deadline (within_24_hours/within_3_days/this_week/next_week), priority (high/medium/low)}",
      "- lessons_learned: What to remember for future similar events",
      "- event_feedback: Structured feedback for learning system"
    )
  );
}
