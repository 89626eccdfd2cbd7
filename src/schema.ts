import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { JsonSchema } from "./types.js";
import { deepFreeze, isPlainObject } from "./utils.js";

const SCHEMA_PATH = fileURLToPath(new URL("../schemas/vdom-schema-v1.json", import.meta.url));

/**
 * Reads a JSON Schema document and returns it deep-frozen.
 * Throws when the file does not hold a JSON object.
 */
export function loadSchema(path: string): JsonSchema {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!isPlainObject(parsed)) {
    throw new Error(`Schema at ${path} is not a JSON object`);
  }
  return deepFreeze(parsed);
}

/** The canonical VDOM v1 schema, read once on first import. */
export const VDOM_SCHEMA: JsonSchema = loadSchema(SCHEMA_PATH);
