import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines, joinList } from "./shared";

const TOOL_NAME = "discover_job_sources";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => discoverJobSources(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Discover job boards and sources matching target sectors", deps.schemaDir)
  );
}

export async function discoverJobSources(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const sectors = args.stringArray("sectors");
  const location = args.stringValue("location");
  const includeRemote = args.bool("include_remote") ?? true;
  const count = args.int("count") ?? 10;

  const [preferences, existingSources] = await Promise.all([
    provider.getPreferencesContext(),
    provider.getExistingSourceUrls()
  ]);

  return contextResult(
    {
      sectors,
      location,
      include_remote: includeRemote,
      requested_count: count,
      existing_source_urls: existingSources,
      preferences
    },
    instructionLines(
      `Discover ${count} new job sources for sectors: ${joinList(sectors)} in ${location}.`,
      "Exclude URLs already in existing_source_urls.",
      `Include remote-friendly: ${includeRemote}.`,
      "Return sources as JSON array with: name, url, category, relevance_reason, recommended_cadence_days.",
      "Categories: local, industry, company_direct, aggregator, startup, staffing, networking."
    )
  );
}
