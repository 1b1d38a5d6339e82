import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "generate_weekly_reflection";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => generateWeeklyReflection(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Generate weekly reflection on job search progress", deps.schemaDir)
  );
}

export async function generateWeeklyReflection(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const includeMetrics = args.bool("include_metrics") ?? true;
  const focus = args.string("focus") ?? "balanced";

  const [weeklySummary, goalProgress] = await Promise.all([
    provider.getWeeklySummaryContext(),
    provider.getGoalProgressContext()
  ]);

  return contextResult(
    {
      include_metrics: includeMetrics,
      focus,
      weekly_summary: weeklySummary,
      goal_progress: goalProgress
    },
    instructionLines(
      `Generate a weekly reflection. Focus: ${focus}. Include metrics: ${includeMetrics}.`,
      "Return JSON with:",
      "- reflection: 2-3 paragraph reflection text",
      "- achievements: Array of notable achievements",
      "- improvements: Array of areas to improve",
      "- next_week_focus: Key focus for next week",
      "- encouragement: Personalized encouragement message"
    )
  );
}
