import type { VdomElement } from "./element.js";
import { AttributeTypeError, ChildTypeError, InvalidTagNameError } from "./errors.js";
import type { Attributes, ChildNode, StructuredChild, StructuredElement } from "./types.js";
import { isPlainObject } from "./utils.js";

/**
 * Converts an element to the VDOM wire format.
 *
 * `attributes` and `children` are always present; `key` only when the
 * element has one. Text children become plain strings.
 */
export function elementToStructured(element: VdomElement): StructuredElement {
  const structured: StructuredElement = {
    tagName: element.tagName,
    attributes: { ...element.attributes },
    children: element.children.map((child) => childToStructured(child)),
  };

  if (element.key !== undefined) {
    structured.key = element.key;
  }

  return structured;
}

function childToStructured(child: ChildNode): StructuredChild {
  if (child.type === "text") {
    return child.value;
  }
  return elementToStructured(child);
}

/**
 * Fills in the optional wire fields of a structured value, recursively.
 * No schema is consulted; only the field types are checked.
 */
export function normalizeStructured(record: Record<string, unknown>): StructuredElement {
  const { tagName, attributes, children, key } = record;
  if (typeof tagName !== "string") {
    throw new InvalidTagNameError(tagName);
  }

  if (attributes !== undefined && !isPlainObject(attributes)) {
    throw new AttributeTypeError();
  }
  if (children !== undefined && !Array.isArray(children)) {
    throw new ChildTypeError(children);
  }

  const entries: unknown[] = Array.isArray(children) ? children : [];
  const structured: StructuredElement = {
    tagName,
    attributes: isPlainObject(attributes) ? toAttributes(attributes) : {},
    children: entries.map((child) => normalizeStructuredChild(child)),
  };

  if (typeof key === "string") {
    structured.key = key;
  }

  return structured;
}

function normalizeStructuredChild(child: unknown): StructuredChild {
  if (typeof child === "string") return child;
  if (isPlainObject(child)) return normalizeStructured(child);
  throw new ChildTypeError(child);
}

export function toAttributes(record: Record<string, unknown>): Attributes {
  const pairs: [string, string][] = [];
  for (const [name, value] of Object.entries(record)) {
    if (typeof value !== "string") {
      throw new AttributeTypeError(name);
    }
    pairs.push([name, value]);
  }

  // fromEntries defines own properties, so a "__proto__" key stays an attribute.
  return Object.fromEntries(pairs);
}
