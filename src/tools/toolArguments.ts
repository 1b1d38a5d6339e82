import { JsonObject, JsonValue, isJsonObject } from "../types";

export type ParsedArguments = {
  args: ToolArguments;
  malformed: boolean;
};

/**
 * Parses the raw argument blob of a tool call. Anything that is not a JSON object
 * becomes an empty argument set; handlers apply their own defaults.
 */
export function parseToolArguments(rawArguments: string): ParsedArguments {
  const text = String(rawArguments ?? "").trim();
  if (!text) {
    return { args: new ToolArguments({}), malformed: false };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { args: new ToolArguments({}), malformed: true };
  }

  if (!isJsonObject(parsed)) {
    return { args: new ToolArguments({}), malformed: true };
  }
  return { args: new ToolArguments(parsed), malformed: false };
}

/**
 * Typed, lenient read access to model-supplied arguments.
 *
 * Optional accessors return undefined on a missing or mistyped value; the `*Value`
 * accessors fall back to an empty value instead.
 */
export class ToolArguments {
  private readonly values: JsonObject;

  constructor(values: JsonObject) {
    this.values = values;
  }

  raw(): JsonObject {
    return { ...this.values };
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  string(key: string): string | undefined {
    const value = this.values[key];
    return typeof value === "string" ? value : undefined;
  }

  stringValue(key: string): string {
    return toStringValue(this.values[key]);
  }

  int(key: string): number | undefined {
    const value = this.values[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return undefined;
    }
    return Math.trunc(value);
  }

  number(key: string): number | undefined {
    const value = this.values[key];
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
  }

  bool(key: string): boolean | undefined {
    const value = this.values[key];
    return typeof value === "boolean" ? value : undefined;
  }

  stringArray(key: string): string[] {
    const value = this.values[key];
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => toStringValue(item));
  }

  objectArray(key: string): JsonObject[] {
    const value = this.values[key];
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => (isJsonObject(item) ? item : {}));
  }

  object(key: string): JsonObject | undefined {
    const value = this.values[key];
    return isJsonObject(value) ? value : undefined;
  }
}

function toStringValue(value: JsonValue | undefined): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}
