import fs from "fs";
import path from "path";
import { isJsonObject } from "../types";
import { SchemaNode, compileSchema } from "./schemaCompiler";

export class SchemaConfigurationError extends Error {
  readonly resourceName: string;

  constructor(resourceName: string, message: string) {
    super(`Schema resource "${resourceName}": ${message}`);
    this.name = "SchemaConfigurationError";
    this.resourceName = resourceName;
  }
}

export function schemaResourcePath(resourceName: string, schemaDir: string): string {
  return path.join(schemaDir, `${resourceName}.json`);
}

/**
 * Reads and compiles `<schemaDir>/<resourceName>.json`.
 *
 * Schema files ship with the application, so anything wrong with them is a broken build:
 * this throws SchemaConfigurationError instead of degrading.
 */
export function loadSchema(resourceName: string, schemaDir: string): SchemaNode {
  const filePath = schemaResourcePath(resourceName, schemaDir);
  if (!fs.existsSync(filePath)) {
    throw new SchemaConfigurationError(resourceName, `not found at ${filePath}`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new SchemaConfigurationError(resourceName, `unreadable (${describeError(error)})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SchemaConfigurationError(resourceName, `invalid JSON (${describeError(error)})`);
  }

  if (!isJsonObject(parsed)) {
    throw new SchemaConfigurationError(resourceName, "top-level value must be a JSON object");
  }

  return compileSchema(parsed);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
