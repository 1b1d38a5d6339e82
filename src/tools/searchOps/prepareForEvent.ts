import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "prepare_for_event";
const DEFAULT_PERSONAL_GOALS = "Make meaningful connections";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => prepareForEvent(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Generate preparation materials for a networking event", deps.schemaDir)
  );
}

export async function prepareForEvent(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const eventId = args.stringValue("event_id");
  const focusCompanies = args.stringArray("focus_companies");
  const personalGoals = args.string("personal_goals") ?? DEFAULT_PERSONAL_GOALS;

  const [event, preferences, existingContacts] = await Promise.all([
    provider.getEventContext(eventId),
    provider.getPreferencesContext(),
    provider.getContactsAtCompanies(focusCompanies)
  ]);

  return contextResult(
    {
      event_id: eventId,
      event,
      focus_companies: focusCompanies,
      personal_goals: personalGoals,
      existing_contacts: existingContacts,
      preferences
    },
    instructionLines(
      "Generate event preparation materials.",
      "Return JSON with:",
      "- goal: One sentence goal for this event",
      "- pitch_script: 30-second elevator pitch",
      "- talking_points: Array of {topic, relevance, your_angle}",
      "- target_companies: Array of {company, why_relevant, recent_news, open_roles, possible_openers}",
      "- conversation_starters: Array of conversation starters",
      "- things_to_avoid: Array of topics/behaviors to avoid"
    )
  );
}
