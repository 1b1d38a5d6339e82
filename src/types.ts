export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ToolStatus = "context_provided" | "error";

export type ToolErrorResult = {
  status: "error";
  error: string;
};

export type ToolContextResult = {
  status: "context_provided";
  instruction: string;
  [key: string]: JsonValue;
};

export type ToolResult = ToolErrorResult | ToolContextResult;

export type ToolInvocation = {
  toolName: string;
  rawArguments: string;
};

export function isJsonObject(value: unknown): value is JsonObject {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value);
}
