import path from "path";
import { LogLevel, parseLogLevel } from "./logger";

export type Config = {
  port: number;
  schemaDir: string;
  contextFile: string;
  auditLogPath: string;
  logLevel: LogLevel;
  logToolArguments: boolean;
  maxFinishedOperations: number;
};

const DEFAULT_PORT = 3000;
const DEFAULT_SCHEMA_DIR = "schemas/tools";
const DEFAULT_MAX_FINISHED_OPERATIONS = 200;

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  return {
    port: parsePort(env.PORT),
    schemaDir: path.resolve(cwd, nonEmpty(env.SCHEMA_DIR) ?? DEFAULT_SCHEMA_DIR),
    contextFile: resolveOptionalPath(env.CONTEXT_FILE, cwd),
    auditLogPath: resolveOptionalPath(env.AUDIT_LOG_PATH, cwd),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logToolArguments: (env.TOOL_LOG_ARGUMENTS ?? "false").trim().toLowerCase() === "true",
    maxFinishedOperations: parseCount(env.MAX_FINISHED_OPERATIONS, DEFAULT_MAX_FINISHED_OPERATIONS)
  };
}

function parsePort(raw: string | undefined): number {
  const value = Number(raw ?? DEFAULT_PORT);
  if (!Number.isInteger(value) || value <= 0 || value > 65535) {
    return DEFAULT_PORT;
  }
  return value;
}

function parseCount(raw: string | undefined, fallback: number): number {
  const value = Number(nonEmpty(raw) ?? fallback);
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}

function resolveOptionalPath(raw: string | undefined, cwd: string): string {
  const value = nonEmpty(raw);
  return value ? path.resolve(cwd, value) : "";
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = String(raw ?? "").trim();
  return value ? value : undefined;
}
