import { randomUUID } from "crypto";
import { AuditSink } from "../auditLogger";
import { Logger, silentLogger } from "../logger";
import { OperationTracker } from "../operations/operationTracker";
import { ToolErrorResult, ToolResult } from "../types";
import { parseToolArguments } from "./toolArguments";
import { ToolRegistry } from "./toolRegistry";

export type DispatcherStats = {
  invocations: number;
  errors: number;
  unknownTools: number;
  malformedArguments: number;
};

export type ToolDispatcherOptions = {
  logger?: Logger;
  tracker?: OperationTracker;
  audit?: AuditSink;
  logArguments?: boolean;
};

/**
 * Single entry point for model-issued tool calls.
 *
 * `execute` always resolves to JSON text with a `status` field; nothing a handler or
 * context provider throws crosses this boundary. Invocations may overlap; the only
 * shared mutable state here is `stats`, which is updated synchronously.
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly tracker?: OperationTracker;
  private readonly audit?: AuditSink;
  private readonly logArguments: boolean;
  private readonly counters: DispatcherStats = {
    invocations: 0,
    errors: 0,
    unknownTools: 0,
    malformedArguments: 0
  };

  constructor(registry: ToolRegistry, options: ToolDispatcherOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? silentLogger;
    this.tracker = options.tracker;
    this.audit = options.audit;
    this.logArguments = options.logArguments ?? false;
  }

  stats(): DispatcherStats {
    return { ...this.counters };
  }

  async execute(toolName: string, rawArguments: string): Promise<string> {
    const start = Date.now();
    const operationId = this.tracker ? randomUUID() : undefined;
    this.counters.invocations += 1;

    let result: ToolResult;
    try {
      this.begin(operationId, toolName, rawArguments);
      result = await this.dispatch(toolName, rawArguments);
    } catch (error) {
      result = errorResult(describeError(error));
    }

    const serialized = this.serialize(result);
    this.finish(operationId, toolName, serialized.result, serialized.text, Date.now() - start);
    return serialized.text;
  }

  private async dispatch(toolName: string, rawArguments: string): Promise<ToolResult> {
    const handler = this.registry.get(toolName);
    if (!handler) {
      this.counters.unknownTools += 1;
      return errorResult(`Unknown tool: ${toolName}`);
    }

    const { args, malformed } = parseToolArguments(rawArguments);
    if (malformed) {
      this.counters.malformedArguments += 1;
      this.logger.warn(`Malformed arguments for ${toolName}; using defaults`);
    }
    if (this.logArguments) {
      this.logger.debug(`Tool ${toolName} arguments`, args.raw());
    }

    return handler.execute(args);
  }

  private serialize(result: ToolResult): { text: string; result: ToolResult } {
    try {
      return { text: JSON.stringify(result), result };
    } catch (error) {
      const fallback = errorResult(`Tool result could not be serialized: ${describeError(error)}`);
      return { text: JSON.stringify(fallback), result: fallback };
    }
  }

  private begin(operationId: string | undefined, toolName: string, rawArguments: string): void {
    this.logger.info(`Tool: ${toolName}`);
    if (!this.tracker || !operationId) return;
    this.tracker.trackOperation(operationId, "tool_call", toolName);
    this.tracker.appendTranscript(operationId, "modelRequest", `Tool call: ${toolName}`, rawArguments);
  }

  private finish(
    operationId: string | undefined,
    toolName: string,
    result: ToolResult,
    text: string,
    latencyMs: number
  ): void {
    const error = result.status === "error" ? result.error : undefined;
    const failed = error !== undefined;

    if (failed) {
      this.counters.errors += 1;
      this.logger.warn(`Tool ${toolName} failed: ${error}`);
    }

    try {
      if (this.tracker && operationId) {
        this.tracker.appendTranscript(operationId, "modelResponse", `Tool result: ${toolName}`, text);
        if (failed) {
          this.tracker.markFailed(operationId, error);
        } else {
          this.tracker.markCompleted(operationId);
        }
      }
      this.audit?.({
        toolName,
        status: failed ? "error" : "context_provided",
        latencyMs,
        ...(error !== undefined ? { error } : {}),
        ...(operationId ? { operationId } : {})
      });
    } catch (sinkError) {
      this.logger.error(`Recording tool ${toolName} outcome failed`, sinkError);
    }
  }
}

export function errorResult(message: string): ToolErrorResult {
  return { status: "error", error: message };
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
