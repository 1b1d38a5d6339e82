import test from "node:test";
import assert from "node:assert/strict";
import { ToolArguments, parseToolArguments } from "./toolArguments";

test("parseToolArguments treats empty input as an empty, well-formed argument set", () => {
  const { args, malformed } = parseToolArguments("");

  assert.equal(malformed, false);
  assert.deepEqual(args.raw(), {});
});

test("parseToolArguments substitutes an empty set for invalid JSON or non-objects", () => {
  for (const raw of ["not json", "[1, 2]", "42", "null", "\"text\""]) {
    const { args, malformed } = parseToolArguments(raw);
    assert.equal(malformed, true, raw);
    assert.deepEqual(args.raw(), {}, raw);
  }
});

test("parseToolArguments keeps a JSON object", () => {
  const { args, malformed } = parseToolArguments(' {"focus_area":"networking"} ');

  assert.equal(malformed, false);
  assert.equal(args.string("focus_area"), "networking");
});

test("ToolArguments accessors read loosely typed values", () => {
  const args = new ToolArguments({
    name: "Dana",
    count: 7.9,
    flag: true,
    list: ["a", 2, true, null],
    objs: [{ a: 1 }, "x"],
    obj: { k: "v" }
  });

  assert.equal(args.has("name"), true);
  assert.equal(args.has("missing"), false);
  assert.equal(args.string("name"), "Dana");
  assert.equal(args.string("count"), undefined);
  assert.equal(args.stringValue("count"), "7.9");
  assert.equal(args.stringValue("flag"), "true");
  assert.equal(args.stringValue("missing"), "");
  assert.equal(args.int("count"), 7);
  assert.equal(args.int("name"), undefined);
  assert.equal(args.number("count"), 7.9);
  assert.equal(args.bool("flag"), true);
  assert.equal(args.bool("name"), undefined);
  assert.deepEqual(args.stringArray("list"), ["a", "2", "true", ""]);
  assert.deepEqual(args.stringArray("name"), []);
  assert.deepEqual(args.objectArray("objs"), [{ a: 1 }, {}]);
  assert.deepEqual(args.object("obj"), { k: "v" });
  assert.equal(args.object("list"), undefined);
});
