import { JsonObject, isJsonObject } from "../types";

export type SchemaKind = "object" | "array" | "string" | "integer" | "number" | "boolean";

export type SchemaNode = {
  kind: SchemaKind;
  description?: string;
  properties?: Record<string, SchemaNode>;
  items?: SchemaNode;
  required?: string[];
  additionalPropertiesAllowed: boolean;
  enumValues?: string[];
};

const SCHEMA_KINDS: readonly SchemaKind[] = ["object", "array", "string", "integer", "number", "boolean"];

/**
 * Builds a SchemaNode tree from a loosely-authored, JSON-Schema-like description.
 *
 * Unknown or missing `type` falls back to `object`, and `additionalProperties` is closed
 * unless the description explicitly opens it. Compiling the same description twice yields
 * structurally equal trees.
 */
export function compileSchema(description: unknown): SchemaNode {
  const source = isJsonObject(description) ? description : {};
  const kind = resolveKind(source.type);

  const node: SchemaNode = {
    kind,
    additionalPropertiesAllowed: source.additionalProperties === true
  };

  if (typeof source.description === "string") {
    node.description = source.description;
  }

  if (kind === "object" && isJsonObject(source.properties)) {
    const properties: Record<string, SchemaNode> = {};
    for (const [name, child] of Object.entries(source.properties)) {
      properties[name] = compileSchema(child);
    }
    node.properties = properties;
  }

  if (kind === "array") {
    // an array node always carries an item schema
    node.items = compileSchema(source.items);
  }

  const required = resolveRequired(source, node.properties);
  if (required) {
    node.required = required;
  }

  if (Array.isArray(source.enum)) {
    node.enumValues = source.enum.filter((value): value is string => typeof value === "string");
  }

  return node;
}

function resolveKind(raw: unknown): SchemaKind {
  return SCHEMA_KINDS.find((kind) => kind === raw) ?? "object";
}

function resolveRequired(
  source: JsonObject,
  properties: Record<string, SchemaNode> | undefined
): string[] | undefined {
  if (!Array.isArray(source.required)) {
    return undefined;
  }
  const known = new Set(Object.keys(properties ?? {}));
  const names: string[] = [];
  for (const value of source.required) {
    if (typeof value === "string" && known.has(value) && !names.includes(value)) {
      names.push(value);
    }
  }
  return names;
}

/**
 * Serialises a node in the JSON-Schema-like shape model providers accept as tool parameters.
 */
export function toJsonSchema(node: SchemaNode): JsonObject {
  const out: JsonObject = { type: node.kind };

  if (node.description !== undefined) {
    out.description = node.description;
  }
  if (node.properties) {
    const properties: JsonObject = {};
    for (const [name, child] of Object.entries(node.properties)) {
      properties[name] = toJsonSchema(child);
    }
    out.properties = properties;
  }
  if (node.items) {
    out.items = toJsonSchema(node.items);
  }
  if (node.required) {
    out.required = [...node.required];
  }
  if (node.kind === "object") {
    out.additionalProperties = node.additionalPropertiesAllowed;
  }
  if (node.enumValues) {
    out.enum = [...node.enumValues];
  }

  return out;
}
