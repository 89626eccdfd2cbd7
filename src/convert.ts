import { normalizeStructured } from "./codec.js";
import { TextNode, VdomElement } from "./element.js";
import { ChildTypeError } from "./errors.js";
import type { JsonSchema, StructuredChild, StructuredElementInput } from "./types.js";
import { isPlainObject } from "./utils.js";
import { validateData } from "./validator.js";

export type Serializable =
  | string
  | TextNode
  | VdomElement
  | StructuredElementInput
  | readonly Serializable[];

export type Structured = StructuredChild | Structured[];

export interface ConvertOptions {
  /** Validate the converted value against this schema before returning it. */
  schema?: JsonSchema;
}

/**
 * Converts elements, text, loose structured values, or lists of any of them
 * to the VDOM wire format.
 */
export function toStructured(value: Serializable, options: ConvertOptions = {}): Structured {
  const structured = convertValue(value);

  if (options.schema !== undefined) {
    validateData(structured, options.schema);
  }

  return structured;
}

function convertValue(value: unknown): Structured {
  if (typeof value === "string") {
    return value;
  }

  if (value instanceof TextNode) {
    return value.value;
  }

  if (value instanceof VdomElement) {
    return value.toStructured();
  }

  if (Array.isArray(value)) {
    return value.map((entry: unknown) => convertValue(entry));
  }

  if (isPlainObject(value) && typeof value.tagName === "string") {
    return normalizeStructured(value);
  }

  throw new ChildTypeError(value);
}
