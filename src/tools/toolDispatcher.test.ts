import test from "node:test";
import assert from "node:assert/strict";
import { AuditEntry } from "../auditLogger";
import { OperationTracker } from "../operations/operationTracker";
import { compileSchema } from "../schema/schemaCompiler";
import { JsonObject } from "../types";
import { ToolDispatcher } from "./toolDispatcher";
import { ToolHandler, ToolRegistry } from "./toolRegistry";

function registryWith(...handlers: ToolHandler[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const handler of handlers) {
    registry.register(handler, {
      name: handler.name,
      description: handler.name,
      argumentSchema: compileSchema({ type: "object" })
    });
  }
  registry.freeze();
  return registry;
}

const echoTool: ToolHandler = {
  name: "echo",
  execute: async (args) => ({ status: "context_provided", received: args.raw(), instruction: "done" })
};

const failingTool: ToolHandler = {
  name: "failing",
  execute: async () => {
    throw new Error("provider offline");
  }
};

test("execute reports an unknown tool as an error envelope", async () => {
  const dispatcher = new ToolDispatcher(registryWith(echoTool));

  const text = await dispatcher.execute("not_a_real_tool", "{}");

  assert.deepEqual(JSON.parse(text), { status: "error", error: "Unknown tool: not_a_real_tool" });
  assert.deepEqual(dispatcher.stats(), { invocations: 1, errors: 1, unknownTools: 1, malformedArguments: 0 });
});

test("execute passes parsed arguments to the handler", async () => {
  const dispatcher = new ToolDispatcher(registryWith(echoTool));

  const text = await dispatcher.execute("echo", '{"focus":"networking","max":3}');

  assert.equal(text, '{"status":"context_provided","received":{"focus":"networking","max":3},"instruction":"done"}');
});

test("execute substitutes empty arguments for malformed input", async () => {
  const dispatcher = new ToolDispatcher(registryWith(echoTool));

  const text = await dispatcher.execute("echo", "{not json");

  assert.deepEqual(JSON.parse(text), { status: "context_provided", received: {}, instruction: "done" });
  assert.deepEqual(dispatcher.stats(), { invocations: 1, errors: 0, unknownTools: 0, malformedArguments: 1 });
});

test("execute converts a handler failure into an error envelope", async () => {
  const dispatcher = new ToolDispatcher(registryWith(failingTool));

  const text = await dispatcher.execute("failing", "{}");

  assert.deepEqual(JSON.parse(text), { status: "error", error: "provider offline" });
  assert.equal(dispatcher.stats().errors, 1);
});

test("execute describes non-Error rejections", async () => {
  const dispatcher = new ToolDispatcher(
    registryWith({
      name: "rejects",
      execute: () => Promise.reject("store locked")
    })
  );

  assert.deepEqual(JSON.parse(await dispatcher.execute("rejects", "")), { status: "error", error: "store locked" });
});

test("execute turns a serialization failure into an error envelope", async () => {
  const loop: JsonObject = {};
  loop.self = loop;
  const dispatcher = new ToolDispatcher(
    registryWith({
      name: "circular",
      execute: async () => ({ status: "context_provided", context: loop, instruction: "never sent" })
    })
  );

  const parsed = JSON.parse(await dispatcher.execute("circular", "{}"));

  assert.equal(parsed.status, "error");
  assert.match(parsed.error, /^Tool result could not be serialized: /);
});

test("concurrent invocations each get their own result", async () => {
  const dispatcher = new ToolDispatcher(registryWith(echoTool));

  const results = await Promise.all([
    dispatcher.execute("echo", '{"n":1}'),
    dispatcher.execute("echo", '{"n":2}'),
    dispatcher.execute("missing", "{}")
  ]);

  assert.deepEqual(
    results.map((text) => JSON.parse(text).received ?? null),
    [{ n: 1 }, { n: 2 }, null]
  );
  assert.equal(dispatcher.stats().invocations, 3);
});

test("execute tracks each invocation as a tool_call operation", async () => {
  const tracker = new OperationTracker();
  const dispatcher = new ToolDispatcher(registryWith(echoTool, failingTool), { tracker });

  await dispatcher.execute("echo", '{"n":1}');
  await dispatcher.execute("failing", "{}");

  const [failed, completed] = tracker.list();
  assert.equal(completed.kind, "tool_call");
  assert.equal(completed.name, "echo");
  assert.equal(completed.status, "completed");
  assert.deepEqual(
    completed.transcript.map((entry) => [entry.entryType, entry.content, entry.details]),
    [
      ["modelRequest", "Tool call: echo", '{"n":1}'],
      ["modelResponse", "Tool result: echo", '{"status":"context_provided","received":{"n":1},"instruction":"done"}']
    ]
  );

  assert.equal(failed.name, "failing");
  assert.equal(failed.status, "failed");
  assert.equal(failed.error, "provider offline");
  assert.deepEqual(
    failed.transcript.map((entry) => entry.entryType),
    ["modelRequest", "modelResponse", "error"]
  );
  assert.equal(tracker.isAnyRunning, false);
});

test("execute writes one audit entry per invocation", async () => {
  const entries: AuditEntry[] = [];
  const dispatcher = new ToolDispatcher(registryWith(echoTool, failingTool), {
    audit: (entry) => entries.push(entry)
  });

  await dispatcher.execute("echo", "{}");
  await dispatcher.execute("failing", "{}");

  assert.deepEqual(
    entries.map(({ toolName, status, error }) => ({ toolName, status, error })),
    [
      { toolName: "echo", status: "context_provided", error: undefined },
      { toolName: "failing", status: "error", error: "provider offline" }
    ]
  );
  assert.equal(typeof entries[0].latencyMs, "number");
  assert.equal("operationId" in entries[0], false);
});

test("a throwing audit sink does not change the result", async () => {
  const dispatcher = new ToolDispatcher(registryWith(echoTool), {
    audit: () => {
      throw new Error("disk full");
    }
  });

  const text = await dispatcher.execute("echo", "{}");

  assert.deepEqual(JSON.parse(text), { status: "context_provided", received: {}, instruction: "done" });
});
