import test from "node:test";
import assert from "node:assert/strict";
import path from "path";
import { createAgentServices } from "../agent";
import { Config } from "../config";
import { silentLogger } from "../logger";
import { InMemoryContextProvider } from "../tools/contextProvider";
import { executeToolRequest, parseToolRequest } from "./http";

const CONFIG: Config = {
  port: 3000,
  schemaDir: path.resolve(__dirname, "../../schemas/tools"),
  contextFile: "",
  auditLogPath: "",
  logLevel: "error",
  logToolArguments: false,
  maxFinishedOperations: 5
};

function services() {
  return createAgentServices(CONFIG, silentLogger, new InMemoryContextProvider({ dailyTasks: { open: 1 } }));
}

test("parseToolRequest requires a tool name", () => {
  assert.equal(parseToolRequest(undefined), undefined);
  assert.equal(parseToolRequest([]), undefined);
  assert.equal(parseToolRequest({ arguments: "{}" }), undefined);
  assert.equal(parseToolRequest({ toolName: "   " }), undefined);
});

test("parseToolRequest keeps string arguments and re-serialises objects", () => {
  assert.deepEqual(parseToolRequest({ toolName: "debrief_event", arguments: '{"rating":4}' }), {
    toolName: "debrief_event",
    rawArguments: '{"rating":4}'
  });
  assert.deepEqual(parseToolRequest({ toolName: "debrief_event", arguments: { rating: 4 } }), {
    toolName: "debrief_event",
    rawArguments: '{"rating":4}'
  });
  assert.deepEqual(parseToolRequest({ toolName: "debrief_event" }), {
    toolName: "debrief_event",
    rawArguments: ""
  });
});

test("createAgentServices freezes a catalogue of the ten tools", () => {
  const { registry } = services();

  assert.equal(registry.isFrozen(), true);
  assert.equal(registry.listNames().length, 10);
});

test("finished tool calls are evicted beyond the configured retention", async () => {
  const { dispatcher, tracker } = services();

  for (let call = 0; call < 50; call += 1) {
    await dispatcher.execute("generate_daily_tasks", "{}");
  }

  const operations = tracker.list();
  assert.equal(operations.length, 5);
  assert.equal(
    operations.reduce((entries, op) => entries + op.transcript.length, 0),
    10
  );
  assert.equal(dispatcher.stats().invocations, 50);
});

test("executeToolRequest answers a missing tool name with 400", async () => {
  const reply = await executeToolRequest(services().dispatcher, { arguments: "{}" });

  assert.deepEqual(reply, { status: 400, kind: "json", body: { error: "Missing toolName" } });
});

test("executeToolRequest returns the dispatcher's JSON text", async () => {
  const { dispatcher, tracker } = services();

  const reply = await executeToolRequest(dispatcher, {
    toolName: "generate_daily_tasks",
    arguments: { max_tasks: 3 }
  });

  assert.equal(reply.status, 200);
  assert.equal(reply.kind, "text");
  const result = JSON.parse(String(reply.body));
  assert.equal(result.status, "context_provided");
  assert.equal(result.max_tasks, 3);
  assert.deepEqual(result.context, { open: 1 });
  assert.equal(tracker.list()[0].name, "generate_daily_tasks");
  assert.equal(tracker.list()[0].status, "completed");
});

test("executeToolRequest reports unknown tools inside a 200 envelope", async () => {
  const reply = await executeToolRequest(services().dispatcher, { toolName: "not_a_real_tool", arguments: "{}" });

  assert.deepEqual(reply, {
    status: 200,
    kind: "text",
    body: '{"status":"error","error":"Unknown tool: not_a_real_tool"}'
  });
});
