import { randomUUID } from "crypto";
import { Logger, silentLogger } from "../logger";

export type OperationStatus = "pending" | "running" | "completed" | "failed";

export type OperationKind =
  | "tool_call"
  | "agent_run"
  | "skill_reorder"
  | "skill_dedupe"
  | "job_recommendation"
  | "document_ingest"
  | "enrichment";

export type TranscriptEntryType = "system" | "modelRequest" | "modelResponse" | "error" | "phase";

export type TranscriptEntry = Readonly<{
  id: string;
  timestamp: Date;
  entryType: TranscriptEntryType;
  content: string;
  details?: string;
}>;

export type Operation = {
  id: string;
  kind: OperationKind;
  name: string;
  status: OperationStatus;
  startTime: Date;
  endTime?: Date;
  transcript: TranscriptEntry[];
  error?: string;
  currentPhase?: string;
  inputTokens: number;
  outputTokens: number;
  cachedTokens: number;
};

export type OperationSummary = {
  kind: OperationKind;
  name: string;
  succeeded: boolean;
  durationMs?: number;
  error?: string;
};

export type TrackerDiagnostics = {
  unknownId: number;
  duplicateTerminal: number;
};

export type OperationTrackerOptions = {
  logger?: Logger;
  now?: () => Date;
  /** Finished operations kept after each terminal transition; older ones are evicted. */
  maxFinished?: number;
  onAllCompleted?: (summaries: OperationSummary[]) => void;
};

export function isTerminal(status: OperationStatus): boolean {
  return status === "completed" || status === "failed";
}

export function totalTokens(operation: Operation): number {
  // cached tokens are already part of inputTokens
  return operation.inputTokens + operation.outputTokens;
}

/**
 * Elapsed milliseconds. Finished operations use their end time, running ones are
 * measured against `now`, pending ones have no duration yet.
 */
export function operationDuration(operation: Operation, now: Date = new Date()): number | undefined {
  if (operation.endTime) {
    return operation.endTime.getTime() - operation.startTime.getTime();
  }
  if (operation.status === "running") {
    return now.getTime() - operation.startTime.getTime();
  }
  return undefined;
}

/**
 * In-memory lifecycle, transcript and token accounting for long-running AI work.
 *
 * All mutation goes through this class; callers only ever see copies. Calls that name an
 * unknown id, or that try to finish an operation twice, are ignored and counted in
 * `diagnostics()`: completion signals from async call sites can arrive late or twice.
 */
export class OperationTracker {
  private operations: Operation[] = [];
  private selected: string | undefined;
  private readonly recentlyFinished = new Set<string>();
  private readonly counters: TrackerDiagnostics = { unknownId: 0, duplicateTerminal: 0 };
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly maxFinished: number;
  private readonly onAllCompleted?: (summaries: OperationSummary[]) => void;

  constructor(options: OperationTrackerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.maxFinished = Math.max(0, Math.floor(options.maxFinished ?? Number.POSITIVE_INFINITY));
    this.onAllCompleted = options.onAllCompleted;
  }

  get selectedId(): string | undefined {
    return this.selected;
  }

  get runningCount(): number {
    return this.operations.filter((op) => op.status === "running").length;
  }

  get isAnyRunning(): boolean {
    return this.runningCount > 0;
  }

  trackOperation(
    id: string,
    kind: OperationKind,
    name: string,
    status: "pending" | "running" = "running"
  ): void {
    if (this.find(id)) {
      this.logger.warn(`Operation already tracked, ignoring: ${shortId(id)}`);
      return;
    }

    this.operations.unshift({
      id,
      kind,
      name,
      status,
      startTime: this.now(),
      transcript: [],
      inputTokens: 0,
      outputTokens: 0,
      cachedTokens: 0
    });

    if (this.selected === undefined || (status === "running" && this.runningCount === 1)) {
      this.selected = id;
    }

    this.logger.info(`Operation tracked: [${kind}] ${name} (id: ${shortId(id)}, status: ${status})`);
  }

  markRunning(id: string): void {
    const op = this.lookup(id, "mark running");
    if (!op) return;
    if (op.status !== "pending") {
      this.logger.debug(`Operation ${shortId(id)} is ${op.status}; markRunning ignored`);
      return;
    }
    op.status = "running";
  }

  appendTranscript(id: string, entryType: TranscriptEntryType, content: string, details?: string): void {
    const op = this.lookup(id, "append transcript");
    if (!op) return;
    this.pushEntry(op, entryType, content, details);
  }

  updatePhase(id: string, phase: string): void {
    const op = this.lookup(id, "update phase");
    if (!op) return;
    op.currentPhase = phase;
    this.pushEntry(op, "phase", phase);
  }

  markCompleted(id: string): void {
    const op = this.lookupForTermination(id, "mark completed");
    if (!op) return;

    op.status = "completed";
    this.finish(op);
    this.logger.info(`Operation completed: ${op.name} (${formatDuration(op)})`);
    this.notifyIfAllCompleted();
    this.evictFinished();
  }

  markFailed(id: string, error: string): void {
    const op = this.lookupForTermination(id, "mark failed");
    if (!op) return;

    op.status = "failed";
    op.error = error;
    this.finish(op);
    this.pushEntry(op, "error", "Operation failed", error);
    this.logger.error(`Operation failed: ${op.name} - ${error}`);
    this.notifyIfAllCompleted();
    this.evictFinished();
  }

  /** Adds to the running totals. Accepted in every state, including after completion. */
  addTokenUsage(id: string, input: number, output: number, cached = 0): void {
    const op = this.lookup(id, "add token usage");
    if (!op) return;

    op.inputTokens += toTokenCount(input);
    op.outputTokens += toTokenCount(output);
    op.cachedTokens += toTokenCount(cached);
    this.logger.debug(`Token usage for ${shortId(id)}: +${input} in, +${output} out (total: ${totalTokens(op)})`);
  }

  duration(id: string): number | undefined {
    const op = this.find(id);
    return op ? operationDuration(op, this.now()) : undefined;
  }

  /** Drops every finished operation and repairs the selection. */
  clearCompleted(): number {
    const before = this.operations.length;
    this.operations = this.operations.filter((op) => !isTerminal(op.status));
    this.repairAfterRemoval();
    return before - this.operations.length;
  }

  select(id: string | undefined): void {
    if (id !== undefined && !this.find(id)) {
      this.lookup(id, "select");
      return;
    }
    this.selected = id;
  }

  get(id: string): Operation | undefined {
    const op = this.find(id);
    return op ? snapshot(op) : undefined;
  }

  list(): Operation[] {
    return this.operations.map(snapshot);
  }

  running(): Operation[] {
    return this.operations.filter((op) => op.status === "running").map(snapshot);
  }

  diagnostics(): TrackerDiagnostics {
    return { ...this.counters };
  }

  private find(id: string): Operation | undefined {
    return this.operations.find((op) => op.id === id);
  }

  private lookup(id: string, action: string): Operation | undefined {
    const op = this.find(id);
    if (!op) {
      this.counters.unknownId += 1;
      this.logger.debug(`Cannot ${action}: operation not found (id: ${shortId(id)})`);
    }
    return op;
  }

  private lookupForTermination(id: string, action: string): Operation | undefined {
    const op = this.lookup(id, action);
    if (op && isTerminal(op.status)) {
      this.counters.duplicateTerminal += 1;
      this.logger.debug(`Cannot ${action}: operation ${shortId(id)} already ${op.status}`);
      return undefined;
    }
    return op;
  }

  /**
   * Drops the oldest finished operations beyond `maxFinished`. Operations still waiting
   * for the onAllCompleted notification stay until it fires.
   */
  private evictFinished(): void {
    let excess = this.operations.filter((op) => isTerminal(op.status)).length - this.maxFinished;
    if (excess <= 0) return;

    const kept: Operation[] = [];
    for (let index = this.operations.length - 1; index >= 0; index -= 1) {
      const op = this.operations[index];
      if (excess > 0 && isTerminal(op.status) && !this.recentlyFinished.has(op.id)) {
        excess -= 1;
        continue;
      }
      kept.unshift(op);
    }
    const evicted = this.operations.length - kept.length;
    this.operations = kept;
    this.repairAfterRemoval();
    this.logger.debug(`Evicted ${evicted} finished operation(s)`);
  }

  private repairAfterRemoval(): void {
    for (const id of Array.from(this.recentlyFinished)) {
      if (!this.find(id)) this.recentlyFinished.delete(id);
    }
    if (this.selected !== undefined && !this.find(this.selected)) {
      this.selected = this.operations[0]?.id;
    }
  }

  private finish(op: Operation): void {
    op.endTime = this.now();
    op.currentPhase = undefined;
    if (this.onAllCompleted) {
      this.recentlyFinished.add(op.id);
    }
  }

  private pushEntry(op: Operation, entryType: TranscriptEntryType, content: string, details?: string): void {
    const entry: TranscriptEntry = Object.freeze({
      id: randomUUID(),
      timestamp: this.now(),
      entryType,
      content,
      ...(details !== undefined ? { details } : {})
    });
    op.transcript.push(entry);
  }

  private notifyIfAllCompleted(): void {
    const listener = this.onAllCompleted;
    if (this.runningCount > 0 || this.recentlyFinished.size === 0 || !listener) {
      return;
    }

    const summaries: OperationSummary[] = [];
    for (const id of this.recentlyFinished) {
      const op = this.find(id);
      if (!op) continue;
      summaries.push({
        kind: op.kind,
        name: op.name,
        succeeded: op.status === "completed",
        durationMs: operationDuration(op),
        ...(op.error !== undefined ? { error: op.error } : {})
      });
    }
    this.recentlyFinished.clear();

    this.logger.info(`All operations completed (${summaries.length} in batch)`);
    try {
      listener(summaries);
    } catch (error) {
      this.logger.error("onAllCompleted listener threw", error);
    }
  }
}

function snapshot(op: Operation): Operation {
  return {
    ...op,
    startTime: new Date(op.startTime.getTime()),
    endTime: op.endTime ? new Date(op.endTime.getTime()) : undefined,
    transcript: op.transcript.slice()
  };
}

function toTokenCount(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.floor(value);
}

function shortId(id: string): string {
  return id.slice(0, 8);
}

function formatDuration(op: Operation): string {
  const ms = operationDuration(op);
  return ms === undefined ? "Running..." : `${(ms / 1000).toFixed(1)}s`;
}
