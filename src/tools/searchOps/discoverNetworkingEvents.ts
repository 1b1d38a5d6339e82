import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines, joinList } from "./shared";

const TOOL_NAME = "discover_networking_events";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => discoverNetworkingEvents(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Search for upcoming networking events matching target sectors", deps.schemaDir)
  );
}

export async function discoverNetworkingEvents(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const sectors = args.stringArray("sectors");
  const location = args.stringValue("location");
  const daysAhead = args.int("days_ahead") ?? 14;
  const includeVirtual = args.bool("include_virtual") ?? true;

  const [preferences, existingEventUrls] = await Promise.all([
    provider.getPreferencesContext(),
    provider.getExistingEventUrls()
  ]);

  return contextResult(
    {
      sectors,
      location,
      days_ahead: daysAhead,
      include_virtual: includeVirtual,
      existing_event_urls: existingEventUrls,
      preferences
    },
    instructionLines(
      `Search for networking events in the next ${daysAhead} days.`,
      `Sectors: ${joinList(sectors)}. Location: ${location}.`,
      `Include virtual: ${includeVirtual}.`,
      "Exclude URLs in existing_event_urls.",
      "Return events as JSON array with: name, date (ISO8601), time, location, url, event_type, organizer, estimated_attendance, cost, relevance_reason.",
      "Event types: meetup, happy_hour, conference, workshop, tech_talk, open_house, career_fair, panel_discussion, hackathon, virtual_event."
    )
  );
}
