import fs from "fs";
import path from "path";
import { ToolStatus } from "./types";

export type AuditEntry = {
  toolName: string;
  status: ToolStatus;
  latencyMs: number;
  error?: string;
  operationId?: string;
};

export type AuditSink = (entry: AuditEntry) => void;

/**
 * Appends one JSON line per entry to `filePath`. Returns undefined when no path is configured.
 */
export function createFileAuditSink(filePath: string): AuditSink | undefined {
  if (!filePath) {
    return undefined;
  }

  return (entry) => {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const line = JSON.stringify({
      ...entry,
      ts: new Date().toISOString()
    });
    fs.appendFileSync(filePath, line + "\n", "utf-8");
  };
}
