import { toDisplayBundle } from "./bundle.js";
import type { DisplayBundleOptions } from "./bundle.js";
import { elementToStructured, toAttributes } from "./codec.js";
import {
  AttributeTypeError,
  ChildTypeError,
  ImmutableMutationError,
  InvalidTagNameError,
} from "./errors.js";
import { renderHtml } from "./renderer.js";
import { VDOM_SCHEMA } from "./schema.js";
import type {
  Attributes,
  ChildInput,
  ChildNode,
  DisplayBundle,
  JsonSchema,
  StructuredElement,
} from "./types.js";
import { hasOwn, isPlainObject } from "./utils.js";
import { validateData } from "./validator.js";

export interface ElementInit {
  attributes?: Attributes;
  children?: readonly ChildInput[];
  key?: string;
  /** When given, the built element's structured form must match it. */
  schema?: JsonSchema;
}

// ── Immutability ──

const immutableHandler: ProxyHandler<object> = {
  set(_target, property) {
    throw new ImmutableMutationError(property);
  },
  defineProperty(_target, property) {
    throw new ImmutableMutationError(property);
  },
  deleteProperty(_target, property) {
    throw new ImmutableMutationError(property);
  },
  setPrototypeOf() {
    throw new ImmutableMutationError("[[Prototype]]");
  },
};

/** Freezes `target` and wraps it so every write throws ImmutableMutationError. */
function lock<T extends object>(target: T): T {
  Object.freeze(target);
  return new Proxy<T>(target, immutableHandler);
}

// ── Nodes ──

export class TextNode {
  readonly type = "text";
  readonly value: string;

  constructor(value: string) {
    if (typeof value !== "string") {
      throw new ChildTypeError(value);
    }
    this.value = value;
    return lock(this);
  }
}

export class VdomElement {
  readonly type = "element";
  readonly tagName: string;
  readonly attributes: Readonly<Attributes>;
  readonly children: readonly ChildNode[];
  readonly key: string | undefined;

  constructor(tagName: string, init: ElementInit = {}) {
    const children = normalizeChildren(init.children);

    if (typeof tagName !== "string" || tagName.length === 0) {
      throw new InvalidTagNameError(tagName);
    }

    this.tagName = tagName;
    this.attributes = lock(normalizeAttributes(init.attributes));
    this.children = lock(children);
    this.key = init.key;

    const node = lock(this);
    if (init.schema !== undefined) {
      validateData(elementToStructured(node), init.schema);
    }
    return node;
  }

  static fromStructured(value: unknown): VdomElement {
    return fromStructured(value);
  }

  toStructured(): StructuredElement {
    return elementToStructured(this);
  }

  toJSON(): StructuredElement {
    return this.toStructured();
  }

  toJsonString(): string {
    return JSON.stringify(this.toStructured());
  }

  toHtml(): string {
    return renderHtml(this);
  }

  toString(): string {
    return this.toHtml();
  }

  toDisplayBundle(options: DisplayBundleOptions = {}): DisplayBundle {
    return toDisplayBundle(this, options);
  }

  validate(schema: JsonSchema): void {
    validateData(this.toStructured(), schema);
  }

  equals(other: VdomElement): boolean {
    return elementsEqual(this, other);
  }
}

export function text(value: string): TextNode {
  return new TextNode(value);
}

export function isElement(value: unknown): value is VdomElement {
  return value instanceof VdomElement;
}

export function isTextNode(value: unknown): value is TextNode {
  return value instanceof TextNode;
}

export function isChildInput(value: unknown): value is ChildInput {
  return typeof value === "string" || isTextNode(value) || isElement(value);
}

// ── Construction helpers ──

function normalizeChildren(input: unknown): ChildNode[] {
  if (input === undefined) return [];
  if (!Array.isArray(input)) {
    throw new ChildTypeError(input);
  }

  return input.map((child: unknown) => normalizeChild(child));
}

function normalizeChild(child: unknown): ChildNode {
  if (typeof child === "string") {
    return new TextNode(child);
  }
  if (child instanceof TextNode || child instanceof VdomElement) {
    return child;
  }
  throw new ChildTypeError(child);
}

function normalizeAttributes(input: unknown): Attributes {
  if (input === undefined) return {};
  if (!isPlainObject(input)) {
    throw new AttributeTypeError();
  }
  return toAttributes(input);
}

// ── Structured input ──

/**
 * Builds an element from the VDOM wire format.
 * The value is always checked against the canonical schema first.
 */
export function fromStructured(value: unknown): VdomElement {
  validateData(value, VDOM_SCHEMA);
  return buildFromStructured(value);
}

function buildFromStructured(value: unknown): VdomElement {
  if (!isPlainObject(value)) {
    throw new ChildTypeError(value);
  }

  const { tagName, attributes, children, key } = value;
  if (typeof tagName !== "string") {
    throw new InvalidTagNameError(tagName);
  }

  const entries: unknown[] = Array.isArray(children) ? children : [];

  return new VdomElement(tagName, {
    attributes: isPlainObject(attributes) ? toAttributes(attributes) : {},
    children: entries.map((child) => (typeof child === "string" ? child : buildFromStructured(child))),
    key: typeof key === "string" ? key : undefined,
  });
}

// ── Equality ──

export function elementsEqual(a: VdomElement, b: VdomElement): boolean {
  if (a === b) return true;
  if (a.tagName !== b.tagName || a.key !== b.key) return false;
  if (!attributesEqual(a.attributes, b.attributes)) return false;
  if (a.children.length !== b.children.length) return false;

  return a.children.every((child, index) => childrenEqual(child, b.children[index]));
}

function attributesEqual(a: Readonly<Attributes>, b: Readonly<Attributes>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => hasOwn(b, key) && a[key] === b[key]);
}

function childrenEqual(a: ChildNode, b: ChildNode | undefined): boolean {
  if (b === undefined) return false;
  if (a.type === "text") {
    return b.type === "text" && a.value === b.value;
  }
  return b.type === "element" && elementsEqual(a, b);
}
