import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "suggest_networking_actions";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => suggestNetworkingActions(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Suggest networking actions to maintain relationships", deps.schemaDir)
  );
}

export async function suggestNetworkingActions(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const focus = args.string("focus") ?? "balanced";
  const maxSuggestions = args.int("max_suggestions") ?? 5;

  const [contactsNeedingAttention, hotContacts, pendingFollowUps, upcomingEvents] = await Promise.all([
    provider.getContactsNeedingAttention(),
    provider.getHotContacts(),
    provider.getPendingFollowUps(),
    provider.getUpcomingEventsContext()
  ]);

  return contextResult(
    {
      focus,
      max_suggestions: maxSuggestions,
      contacts_needing_attention: contactsNeedingAttention,
      hot_contacts: hotContacts,
      pending_follow_ups: pendingFollowUps,
      upcoming_events: upcomingEvents
    },
    instructionLines(
      `Suggest ${maxSuggestions} networking actions. Focus: ${focus}.`,
      "Return JSON array with: contact_name, contact_id, action_type (reach_out/follow_up/reconnect/invite_to_event), action_description, urgency (high/medium/low), suggested_message_opener."
    )
  );
}
