import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { fileURLToPath } from "node:url";
import { parseArgs } from "../parser/parseArgs.js";
import { SchemaError } from "../schema/errors.js";
import { loadSchemaFile, toSchemaDefinition } from "../schema/loadSchema.js";
import { buildExampleSchema, expectBindings, expectError } from "./helpers.js";

const EXAMPLE_SCHEMA = fileURLToPath(new URL("../../schemas/example.json", import.meta.url));
const SIMPLE_SCHEMA = fileURLToPath(new URL("../../schemas/simple.json", import.meta.url));

async function withTempSchema<T>(content: string, fn: (schemaPath: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "argbind-schema-"));
  const schemaPath = path.join(dir, "schema.json");
  await fs.writeFile(schemaPath, content, "utf-8");

  try {
    return await fn(schemaPath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("the example schema file matches the schema built in code", async () => {
  const schema = await loadSchemaFile(EXAMPLE_SCHEMA);
  assert.deepEqual(schema, buildExampleSchema());
});

test("policy overrides apply on top of the file", async () => {
  const schema = await loadSchemaFile(EXAMPLE_SCHEMA, { permute: false });
  assert.equal(schema.policy.permute, false);
  assert.equal(schema.policy.unknownOptions, "reject");
});

test("the simple schema requires its block size and ignores extra positionals", async () => {
  const schema = await loadSchemaFile(SIMPLE_SCHEMA);

  const missing = expectError(parseArgs(schema, []));
  assert.equal(missing.kind, "MissingRequiredOption");
  assert.equal(missing.message, "Missing required option: --block-size");

  const bindings = expectBindings(parseArgs(schema, ["--max_warp", "-b", "4", "x", "y"]));
  assert.deepEqual(bindings.options, {
    "block-size": { source: "argv", value: 4 },
    "max-warp": { source: "argv", value: true },
    cores: { source: "default", value: "John Smith" },
  });
  assert.deepEqual(bindings.positionals, {});
  assert.deepEqual(bindings.variadic, []);
});

test("unreadable schema files are reported as SCHEMA_FILE_UNREADABLE", async () => {
  await withTempSchema("{ not json", async (schemaPath) => {
    await assert.rejects(loadSchemaFile(schemaPath), (error: unknown) => {
      assert.ok(error instanceof SchemaError);
      assert.equal(error.code, "SCHEMA_FILE_UNREADABLE");
      assert.ok(error.message.startsWith(`cannot read schema file ${schemaPath}: `));
      return true;
    });
  });

  const missingPath = path.join(os.tmpdir(), "argbind-missing", "schema.json");
  await assert.rejects(loadSchemaFile(missingPath), { name: "SchemaError", code: "SCHEMA_FILE_UNREADABLE" });
});

test("sanity violations in a file surface as INVALID_SCHEMA", async () => {
  const content = JSON.stringify({ options: [{ name: "quiet", short: "q", required: true }] });
  await withTempSchema(content, async (schemaPath) => {
    await assert.rejects(loadSchemaFile(schemaPath), {
      name: "SchemaError",
      code: "INVALID_SCHEMA",
      message: "options[0].required: flag options cannot be required",
    });
  });
});

test("toSchemaDefinition reports shape errors by path", () => {
  assert.throws(() => toSchemaDefinition([]), { message: "$: expected an object" });
  assert.throws(() => toSchemaDefinition({ options: {} }), { message: "options: expected an array" });
  assert.throws(
    () => toSchemaDefinition({ options: [{ name: "a", short: 3 }] }),
    { message: "options[0].short: expected a string" },
  );
  assert.throws(() => toSchemaDefinition({ options: [{ short: "a" }] }), { message: "options[0].name: is required" });
  assert.throws(
    () => toSchemaDefinition({ positionals: [{ name: "n", valueType: "float" }] }),
    { message: 'positionals[0].valueType: expected "string" or "integer"' },
  );
  assert.throws(
    () => toSchemaDefinition({ policy: { unknownOptions: "skip" } }),
    { message: 'policy.unknownOptions: expected "reject" or "positional"' },
  );
  assert.throws(
    () => toSchemaDefinition({ variadic: { name: "w", help: false } }),
    { message: "variadic.help: expected a string" },
  );
  assert.throws(
    () => toSchemaDefinition({ variadic: { name: "w", defaultValue: 3 } }),
    { message: "variadic.defaultValue: expected a string" },
  );
});

test("toSchemaDefinition keeps only the keys that are present", () => {
  assert.deepEqual(
    toSchemaDefinition({
      options: [{ name: "level", long: "level", valueType: "integer", defaultValue: "0x10" }],
      positionals: [{ name: "src", required: false }],
      variadic: { name: "rest", defaultValue: "-" },
      policy: { extraPositionals: "ignore", help: false },
    }),
    {
      options: [{ name: "level", long: "level", valueType: "integer", defaultValue: "0x10" }],
      positionals: [{ name: "src", required: false }],
      variadic: { name: "rest", defaultValue: "-" },
      policy: { extraPositionals: "ignore", help: false },
    },
  );
});
