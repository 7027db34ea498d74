import assert from "node:assert/strict";
import { test } from "node:test";
import { parseArgs } from "../parser/parseArgs.js";
import { defineSchema } from "../schema/defineSchema.js";
import type { ExtraPositionalPolicy } from "../schema/types.js";
import { buildExampleSchema, expectBindings, expectError } from "./helpers.js";

function buildCopySchema(extraPositionals: ExtraPositionalPolicy = "reject") {
  return defineSchema({
    positionals: [
      { name: "src" },
      { name: "count", valueType: "integer", required: false, defaultValue: 3 },
      { name: "label", required: false },
    ],
    policy: { extraPositionals },
  });
}

test("a missing required slot is reported by name", () => {
  const error = expectError(parseArgs(buildExampleSchema(), []));
  assert.equal(error.kind, "MissingPositionalArgument");
  assert.equal(error.message, "Missing required argument: out_file");
  assert.equal(error.target, "out_file");
});

test("optional slots fall back to their default or stay unset", () => {
  const bindings = expectBindings(parseArgs(buildCopySchema(), ["a"]));
  assert.deepEqual(bindings.positionals, {
    src: { source: "argv", value: "a" },
    count: { source: "default", value: 3 },
    label: { source: "unset" },
  });
  assert.deepEqual(bindings.variadic, []);
});

test("integer slots convert their token", () => {
  const bindings = expectBindings(parseArgs(buildCopySchema(), ["a", "0x20", "copy"]));
  assert.deepEqual(bindings.positionals.count, { source: "argv", value: 32 });
  assert.deepEqual(bindings.positionals.label, { source: "argv", value: "copy" });
});

test("integer slots reject text that is not an integer", () => {
  const error = expectError(parseArgs(buildCopySchema(), ["a", "x"]));
  assert.equal(error.kind, "InvalidPositionalValue");
  assert.equal(error.message, "Invalid value for count at arg 2: x");
  assert.equal(error.token, "x");
  assert.equal(error.index, 1);
  assert.equal(error.target, "count");
});

test("extra positionals are rejected without a variadic slot", () => {
  const error = expectError(parseArgs(buildCopySchema(), ["a", "1", "b", "c", "d"]));
  assert.equal(error.kind, "UnexpectedPositionalArgument");
  assert.equal(error.message, "Unexpected argument: c");
  assert.equal(error.token, "c");
  assert.equal(error.index, 3);
});

test("extra positionals are dropped under the ignore policy", () => {
  const bindings = expectBindings(parseArgs(buildCopySchema("ignore"), ["a", "1", "b", "c", "d"]));
  assert.deepEqual(bindings.positionals, {
    src: { source: "argv", value: "a" },
    count: { source: "argv", value: 1 },
    label: { source: "argv", value: "b" },
  });
  assert.deepEqual(bindings.variadic, []);
});

test("the variadic slot accepts any number of tokens past the fixed slots", () => {
  const schema = buildExampleSchema();
  const words = ["w1", "w2", "w3", "w4"];
  for (let count = 0; count <= words.length; count += 1) {
    const tail = words.slice(0, count);
    const bindings = expectBindings(parseArgs(schema, ["out", "in", ...tail]));
    assert.deepEqual(bindings.variadic, tail);
  }
});

test("slots fill strictly left to right regardless of interleaved options", () => {
  const bindings = expectBindings(parseArgs(buildExampleSchema(), ["first", "-q", "second", "-b", "4", "third"]));
  assert.deepEqual(bindings.positionals, {
    out_file: { source: "argv", value: "first" },
    in_file: { source: "argv", value: "second" },
  });
  assert.deepEqual(bindings.variadic, ["third"]);
});

test("an empty argv succeeds when no slot is required", () => {
  const schema = defineSchema({
    options: [{ name: "verbose", short: "v" }],
    variadic: { name: "files" },
  });
  const bindings = expectBindings(parseArgs(schema, []));
  assert.deepEqual(bindings, {
    options: { verbose: { source: "unset" } },
    positionals: {},
    variadic: [],
    variadicSource: "argv",
  });
});

test("a variadic default fills the capture only when no token is left for it", () => {
  const schema = defineSchema({
    positionals: [{ name: "src" }],
    variadic: { name: "words", defaultValue: "hello" },
  });

  const defaulted = expectBindings(parseArgs(schema, ["a"]));
  assert.deepEqual(defaulted.variadic, ["hello"]);
  assert.equal(defaulted.variadicSource, "default");

  const supplied = expectBindings(parseArgs(schema, ["a", "hello"]));
  assert.deepEqual(supplied.variadic, ["hello"]);
  assert.equal(supplied.variadicSource, "argv");
});
