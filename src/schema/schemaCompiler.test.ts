import test from "node:test";
import assert from "node:assert/strict";
import { compileSchema, toJsonSchema } from "./schemaCompiler";

test("compileSchema defaults a missing type to a closed object", () => {
  assert.deepEqual(compileSchema({ description: "anything" }), {
    kind: "object",
    description: "anything",
    additionalPropertiesAllowed: false
  });
});

test("compileSchema treats an unrecognised type as object", () => {
  assert.equal(compileSchema({ type: "date" }).kind, "object");
});

test("compileSchema treats a non-object description as an empty object schema", () => {
  assert.deepEqual(compileSchema("nonsense"), { kind: "object", additionalPropertiesAllowed: false });
});

test("compileSchema honours an explicit additionalProperties true", () => {
  assert.equal(compileSchema({ type: "object", additionalProperties: true }).additionalPropertiesAllowed, true);
});

test("compileSchema is idempotent for the same description", () => {
  const description = {
    type: "object",
    properties: {
      sectors: { type: "array", items: { type: "string" } },
      count: { type: "integer", description: "How many" }
    },
    required: ["sectors"]
  };

  assert.deepEqual(compileSchema(description), compileSchema(description));
});

test("compileSchema gives an array without items a permissive item schema", () => {
  const node = compileSchema({ type: "array" });

  assert.deepEqual(node.items, { kind: "object", additionalPropertiesAllowed: false });
});

test("compileSchema compiles nested items and properties", () => {
  const node = compileSchema({
    type: "array",
    items: {
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name"]
    }
  });

  assert.equal(node.items?.kind, "object");
  assert.equal(node.items?.properties?.name.kind, "string");
  assert.deepEqual(node.items?.required, ["name"]);
});

test("compileSchema keeps only required names that are declared properties", () => {
  const node = compileSchema({
    type: "object",
    properties: { a: { type: "string" } },
    required: ["a", "b", "a", 3]
  });

  assert.deepEqual(node.required, ["a"]);
});

test("compileSchema keeps string enum values in order", () => {
  assert.deepEqual(compileSchema({ type: "string", enum: ["x", 1, "y"] }), {
    kind: "string",
    additionalPropertiesAllowed: false,
    enumValues: ["x", "y"]
  });
});

test("compileSchema ignores properties on non-object nodes", () => {
  const node = compileSchema({ type: "string", properties: { a: { type: "string" } } });

  assert.equal(node.properties, undefined);
});

test("toJsonSchema renders the advertisement convention", () => {
  const node = compileSchema({
    type: "object",
    description: "Search",
    properties: {
      tags: { type: "array", items: { type: "string" } },
      tone: { type: "string", enum: ["warm", "casual"] }
    },
    required: ["tags"]
  });

  assert.deepEqual(toJsonSchema(node), {
    type: "object",
    description: "Search",
    properties: {
      tags: { type: "array", items: { type: "string" } },
      tone: { type: "string", enum: ["warm", "casual"] }
    },
    required: ["tags"],
    additionalProperties: false
  });
});
