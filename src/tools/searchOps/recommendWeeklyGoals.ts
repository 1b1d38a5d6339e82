import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, formatDecimal, instructionLines } from "./shared";

const TOOL_NAME = "recommend_weekly_goals";
const DEFAULT_AVAILABLE_HOURS = 20;

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => recommendWeeklyGoals(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Recommend weekly goals for job search", deps.schemaDir)
  );
}

export async function recommendWeeklyGoals(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const availableHours = args.number("available_hours") ?? DEFAULT_AVAILABLE_HOURS;
  const priority = args.string("priority") ?? "balanced";

  const [historicalPerformance, pipelineStatus, upcomingEvents] = await Promise.all([
    provider.getWeeklyPerformanceHistory(),
    provider.getPipelineStatus(),
    provider.getUpcomingEventsContext()
  ]);

  return contextResult(
    {
      available_hours: availableHours,
      priority,
      historical_performance: historicalPerformance,
      pipeline_status: pipelineStatus,
      upcoming_events: upcomingEvents
    },
    instructionLines(
      `Recommend weekly goals. Available hours: ${formatDecimal(availableHours)}. Priority: ${priority}.`,
      "Return JSON with:",
      "- application_target: Number of applications to submit",
      "- events_target: Number of events to attend",
      "- new_contacts_target: Number of new contacts to make",
      "- follow_ups_target: Number of follow-ups to send",
      "- time_target_hours: Hours to dedicate",
      "- rationale: Why these targets make sense",
      "- focus_areas: Array of specific focus areas for the week"
    )
  );
}
