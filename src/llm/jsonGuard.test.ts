import test from "node:test";
import assert from "node:assert/strict";
import { LLMDecodeError } from "./errors";
import { isTruncatedJson, jsonBlockCandidates, normalizeRawJson, parseLLMJson } from "./jsonGuard";

test("normalizeRawJson strips a fenced block with a language tag", () => {
  assert.equal(normalizeRawJson('```json\n{"a":1}\n```'), '{"a":1}');
});

test("normalizeRawJson leaves unfenced text trimmed", () => {
  assert.equal(normalizeRawJson('  {"a":1}\n'), '{"a":1}');
});

test("jsonBlockCandidates cuts prose around an object or array", () => {
  assert.deepEqual(jsonBlockCandidates('Here you go: {"a":{"b":2}} Hope it helps!'), ['{"a":{"b":2}}']);
  assert.deepEqual(jsonBlockCandidates("Result: [1, 2] done"), ["[1, 2]"]);
  assert.deepEqual(jsonBlockCandidates("no json here"), ["no json here"]);
});

test("jsonBlockCandidates tries the object span before the array span", () => {
  assert.deepEqual(jsonBlockCandidates('Here [2 items]: {"revArray":[]}'), [
    '{"revArray":[]}',
    '[2 items]: {"revArray":[]'
  ]);
});

test("parseLLMJson finds an object behind bracketed prose", () => {
  assert.deepEqual(parseLLMJson('Here [2 items]: {"revArray":[{"id":"r1"}]}'), { revArray: [{ id: "r1" }] });
});

test("parseLLMJson falls back to the array span when the object span is not JSON", () => {
  assert.deepEqual(parseLLMJson('Here: [{"a":1},{"b":2}] ok'), [{ a: 1 }, { b: 2 }]);
});

test("isTruncatedJson detects open brackets and strings", () => {
  assert.equal(isTruncatedJson('{"a":[1,2'), true);
  assert.equal(isTruncatedJson('{"a":"unterminated'), true);
  assert.equal(isTruncatedJson('{"a":"x}"}'), false);
  assert.equal(isTruncatedJson('{"a":"\\"}"}'), false);
  assert.equal(isTruncatedJson('{"a": 1, "b": [1, 2,],}'), false);
});

test("parseLLMJson refuses to repair output that was cut off", () => {
  assert.throws(
    () => parseLLMJson('{"items":[{"label":"x"},'),
    (error: unknown) => error instanceof LLMDecodeError && error.message === "LLM output is truncated"
  );
});

test("parseLLMJson parses fenced output", () => {
  assert.deepEqual(parseLLMJson('```\n[{"id":"x"}]\n```'), [{ id: "x" }]);
});

test("parseLLMJson repairs near-JSON output", () => {
  assert.deepEqual(parseLLMJson('{"a": 1, "b": [1, 2,],}'), { a: 1, b: [1, 2] });
  assert.deepEqual(parseLLMJson("{'title': 'Lead'}"), { title: "Lead" });
});

test("parseLLMJson rejects empty output", () => {
  assert.throws(
    () => parseLLMJson("   "),
    (error: unknown) => error instanceof LLMDecodeError && error.message === "LLM output is empty"
  );
});
