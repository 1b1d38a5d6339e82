import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "draft_outreach_message";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => draftOutreachMessage(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Draft an outreach message to a contact", deps.schemaDir)
  );
}

export async function draftOutreachMessage(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const contactId = args.stringValue("contact_id");
  const purpose = args.stringValue("purpose");
  const channel = args.stringValue("channel");
  const tone = args.string("tone") ?? "professional";

  const [contact, interactionHistory, userProfile] = await Promise.all([
    provider.getContactContext(contactId),
    provider.getContactInteractionHistory(contactId),
    provider.getUserProfileContext()
  ]);

  return contextResult(
    {
      contact_id: contactId,
      contact,
      interaction_history: interactionHistory,
      user_profile: userProfile,
      purpose,
      channel,
      additional_context: args.string("context") ?? "",
      tone
    },
    instructionLines(
      `Draft an outreach message for ${channel}.`,
      `Purpose: ${purpose}. Tone: ${tone}.`,
      "Return JSON with:",
      "- subject: Subject line (for email)",
      "- message: The draft message",
      "- notes: Tips for sending/timing"
    )
  );
}
