import { ToolDependencies, ToolModule, ToolRegistry } from "../toolRegistry";
import * as debriefEvent from "./debriefEvent";
import * as discoverJobSources from "./discoverJobSources";
import * as discoverNetworkingEvents from "./discoverNetworkingEvents";
import * as draftOutreachMessage from "./draftOutreachMessage";
import * as evaluateNetworkingEvent from "./evaluateNetworkingEvent";
import * as generateDailyTasks from "./generateDailyTasks";
import * as generateWeeklyReflection from "./generateWeeklyReflection";
import * as prepareForEvent from "./prepareForEvent";
import * as recommendWeeklyGoals from "./recommendWeeklyGoals";
import * as suggestNetworkingActions from "./suggestNetworkingActions";

// advertisement order
const SEARCH_OPS_TOOLS: ToolModule[] = [
  generateDailyTasks,
  discoverJobSources,
  discoverNetworkingEvents,
  evaluateNetworkingEvent,
  prepareForEvent,
  debriefEvent,
  suggestNetworkingActions,
  draftOutreachMessage,
  recommendWeeklyGoals,
  generateWeeklyReflection
];

export function registerSearchOpsTools(registry: ToolRegistry, deps: ToolDependencies): void {
  for (const tool of SEARCH_OPS_TOOLS) {
    tool.registerTool(registry, deps);
  }
  deps.logger.info(`Registered ${SEARCH_OPS_TOOLS.length} search tools`);
}
