import assert from "node:assert/strict";
import type { Bindings } from "../bindings/types.js";
import type { ParseError } from "../parser/errors.js";
import type { ParseOutcome } from "../parser/parseArgs.js";
import { defineSchema } from "../schema/defineSchema.js";
import type { ParserPolicy, Schema } from "../schema/types.js";

export function buildExampleSchema(policy: Partial<ParserPolicy> = {}): Schema {
  return defineSchema({
    options: [
      {
        name: "block-size",
        short: "b",
        long: "block-size",
        aliases: ["blocksize", "bs"],
        valueType: "integer",
        defaultValue: 12,
        valueName: "num",
        help: "Set the block size.",
      },
      {
        name: "fav-number",
        long: "fav-number",
        valueType: "integer",
        defaultValue: "0xDEADBEEF",
        valueName: "num",
        help: "Your favorite number.",
      },
      { name: "quiet", short: "q", long: "quiet", help: "Disable output." },
      { name: "name", long: "name", valueType: "string", defaultValue: "John Smith", help: "Your name." },
    ],
    positionals: [
      { name: "out_file", help: "Where output goes." },
      { name: "in_file", required: false, help: "An input file." },
    ],
    variadic: { name: "words", help: "Word(s) of interest." },
    policy,
  });
}

export function expectBindings(outcome: ParseOutcome): Bindings {
  if (outcome.kind !== "bindings") {
    assert.fail(`expected bindings, got ${outcome.kind === "error" ? outcome.error.message : "help"}`);
  }
  return outcome.bindings;
}

export function expectError(outcome: ParseOutcome): ParseError {
  if (outcome.kind !== "error") {
    assert.fail(`expected an error, got ${outcome.kind}`);
  }
  return outcome.error;
}
