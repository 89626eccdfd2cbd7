import type { TextNode, VdomElement } from "./element.js";

// ── Tree Node Types ──

export type ChildNode = TextNode | VdomElement;

/** What the element constructor accepts per child; strings become text nodes. */
export type ChildInput = string | ChildNode;

export type Attributes = Record<string, string>;

// ── Structured Wire Format ──

export type StructuredChild = StructuredElement | string;

export interface StructuredElement {
  tagName: string;
  attributes: Attributes;
  children: StructuredChild[];
  key?: string;
}

/** Structured input as it may arrive off the wire: only `tagName` is required. */
export interface StructuredElementInput {
  tagName: string;
  attributes?: Attributes;
  children?: (StructuredElementInput | string)[];
  key?: string;
}

// ── Schema ──

export type JsonSchema = Readonly<Record<string, unknown>>;

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; issues: ValidationIssue[] };

// ── Display Bundle ──

export const VDOM_MIME_TYPE = "application/vdom.v1+json";
export const TEXT_MIME_TYPE = "text/plain";

export type DisplayMimeType = typeof VDOM_MIME_TYPE | typeof TEXT_MIME_TYPE;

export interface DisplayBundle {
  [VDOM_MIME_TYPE]?: StructuredElement;
  [TEXT_MIME_TYPE]?: string;
}
