import { ToolContextResult } from "../../types";
import { SearchContextProvider } from "../contextProvider";
import { ToolArguments } from "../toolArguments";
import { ToolDependencies, ToolRegistry, describeTool } from "../toolRegistry";
import { contextResult, instructionLines } from "./shared";

const TOOL_NAME = "generate_daily_tasks";

export function registerTool(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.register(
    {
      name: TOOL_NAME,
      execute: (args) => generateDailyTasks(args, deps.contextProvider)
    },
    describeTool(TOOL_NAME, "Generate prioritized daily job search tasks", deps.schemaDir)
  );
}

export async function generateDailyTasks(
  args: ToolArguments,
  provider: SearchContextProvider
): Promise<ToolContextResult> {
  const focusArea = args.string("focus_area") ?? "balanced";
  const maxTasks = args.int("max_tasks") ?? 8;

  const context = await provider.getDailyTaskContext();

  return contextResult(
    {
      focus_area: focusArea,
      max_tasks: maxTasks,
      context
    },
    instructionLines(
      `Based on the context provided, generate ${maxTasks} prioritized daily tasks.`,
      `Focus area: ${focusArea}.`,
      "Return tasks as a JSON array with: task_type, title, description, priority (0-2), estimated_minutes.",
      "Task types: gather, customize, apply, follow_up, networking, event_prep, debrief."
    )
  );
}
