import assert from "node:assert/strict";
import { test } from "node:test";
import { bindingValues, formatArgv } from "../bindings/format.js";
import { parseArgs } from "../parser/parseArgs.js";
import { defineSchema } from "../schema/defineSchema.js";
import { buildExampleSchema, expectBindings } from "./helpers.js";

test("bindingValues flattens bindings and maps unset entries to null", () => {
  const bindings = expectBindings(parseArgs(buildExampleSchema(), ["-b", "20", "out.txt", "in.txt", "foo", "bar"]));
  assert.deepEqual(bindingValues(bindings), {
    options: {
      "block-size": 20,
      "fav-number": 3735928559,
      quiet: null,
      name: "John Smith",
    },
    positionals: { out_file: "out.txt", in_file: "in.txt" },
    variadic: ["foo", "bar"],
  });
});

test("formatArgv writes supplied options in schema order followed by the operands", () => {
  const schema = buildExampleSchema();
  const bindings = expectBindings(parseArgs(schema, ["out.txt", "--name", "Ann", "-qb20", "in.txt", "foo"]));
  assert.deepEqual(formatArgv(schema, bindings), [
    "--block-size=20",
    "--quiet",
    "--name=Ann",
    "--",
    "out.txt",
    "in.txt",
    "foo",
  ]);
});

test("formatArgv leaves out defaulted options and an empty operand list", () => {
  const schema = defineSchema({ options: [{ name: "level", long: "level", valueType: "integer", defaultValue: 2 }] });
  const bindings = expectBindings(parseArgs(schema, []));
  assert.deepEqual(formatArgv(schema, bindings), []);
});

test("formatArgv falls back to an alias or the short flag", () => {
  const schema = defineSchema({
    options: [
      { name: "verbosity", short: "v", valueType: "integer" },
      { name: "legacy", aliases: ["old-name"], valueType: "string" },
      { name: "execute", short: "x" },
    ],
  });
  const bindings = expectBindings(parseArgs(schema, ["-x", "--old-name", "val", "-v3"]));
  assert.deepEqual(formatArgv(schema, bindings), ["-v", "3", "--old-name=val", "-x"]);
});

test("reparsing the formatted argv reproduces the bindings", () => {
  const schema = buildExampleSchema();
  const cases = [
    ["-b", "20", "out.txt", "in.txt", "foo", "bar"],
    ["--bs=3", "-q", "out"],
    ["out", "--blocksize", "4", "--", "-in", "--help"],
    ["--name=", "--fav-number", "-0x10", "out"],
    ["out", "-q", "--name", "Ann Lee"],
    ["-b", "-0", "out"],
    ["--fav-number=-0x0", "out"],
  ];

  for (const argv of cases) {
    const bindings = expectBindings(parseArgs(schema, argv));
    const reparsed = expectBindings(parseArgs(schema, formatArgv(schema, bindings)));
    assert.deepEqual(reparsed, bindings, argv.join(" "));
  }
});

test("formatArgv leaves out a defaulted variadic capture", () => {
  const schema = defineSchema({
    positionals: [{ name: "src" }],
    variadic: { name: "words", defaultValue: "hello" },
  });
  const bindings = expectBindings(parseArgs(schema, ["a"]));
  const argv = formatArgv(schema, bindings);

  assert.deepEqual(argv, ["--", "a"]);
  assert.deepEqual(expectBindings(parseArgs(schema, argv)), bindings);
});
