import { createFileAuditSink } from "./auditLogger";
import { Config } from "./config";
import { Logger, childLogger } from "./logger";
import { OperationTracker } from "./operations/operationTracker";
import { InMemoryContextProvider, SearchContextProvider } from "./tools/contextProvider";
import { registerSearchOpsTools } from "./tools/searchOps";
import { ToolDispatcher } from "./tools/toolDispatcher";
import { ToolRegistry } from "./tools/toolRegistry";

export type AgentServices = {
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  tracker: OperationTracker;
  logger: Logger;
};

/**
 * Wires the tool catalogue, tracker and dispatcher. Throws SchemaConfigurationError when a
 * tool schema is missing or broken; callers treat that as fatal.
 */
export function createAgentServices(
  config: Config,
  logger: Logger,
  contextProvider: SearchContextProvider = defaultContextProvider(config, logger)
): AgentServices {
  const registry = new ToolRegistry();
  registerSearchOpsTools(registry, {
    contextProvider,
    schemaDir: config.schemaDir,
    logger: childLogger(logger, "tools")
  });
  registry.freeze();

  const tracker = new OperationTracker({
    logger: childLogger(logger, "operations"),
    maxFinished: config.maxFinishedOperations,
    onAllCompleted: (summaries) => {
      const failed = summaries.filter((summary) => !summary.succeeded).length;
      logger.debug(`Batch finished: ${summaries.length} operations, ${failed} failed`);
    }
  });

  const dispatcher = new ToolDispatcher(registry, {
    logger: childLogger(logger, "dispatcher"),
    tracker,
    audit: createFileAuditSink(config.auditLogPath),
    logArguments: config.logToolArguments
  });

  return { registry, dispatcher, tracker, logger };
}

function defaultContextProvider(config: Config, logger: Logger): SearchContextProvider {
  if (!config.contextFile) {
    logger.warn("CONTEXT_FILE not set; tools will see empty context");
    return new InMemoryContextProvider();
  }
  logger.info(`Loading context snapshot from ${config.contextFile}`);
  return InMemoryContextProvider.fromFile(config.contextFile);
}
