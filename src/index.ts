export {
  VdomElement,
  TextNode,
  text,
  isElement,
  isTextNode,
  isChildInput,
  fromStructured,
  elementsEqual,
} from "./element.js";
export { createComponent, h } from "./component.js";
export { toStructured } from "./convert.js";
export { fromLegacyValue } from "./legacy.js";
export { renderHtml } from "./renderer.js";
export { toDisplayBundle } from "./bundle.js";
export { validateValue, validateData } from "./validator.js";
export { VDOM_SCHEMA, loadSchema } from "./schema.js";
export { logger } from "./logger.js";
export { escapeHtml } from "./utils.js";
export { isVoidTag } from "./helpers.js";
export * as tags from "./helpers.js";
export { VDOM_MIME_TYPE, TEXT_MIME_TYPE } from "./types.js";
export {
  VdomError,
  SchemaValidationError,
  ChildTypeError,
  ImmutableMutationError,
  DisallowedChildrenError,
  InvalidTagNameError,
  AttributeTypeError,
} from "./errors.js";

export type { ElementInit } from "./element.js";
export type { Component, ComponentArg, ComponentOptions, ComponentProps } from "./component.js";
export type { ConvertOptions, Serializable, Structured } from "./convert.js";
export type { LegacyOptions } from "./legacy.js";
export type { DisplayBundleOptions } from "./bundle.js";
export type { Logger } from "./logger.js";
export type { VdomErrorCode } from "./errors.js";
export type {
  Attributes,
  ChildInput,
  ChildNode,
  DisplayBundle,
  DisplayMimeType,
  JsonSchema,
  StructuredChild,
  StructuredElement,
  StructuredElementInput,
  ValidationIssue,
  ValidationResult,
} from "./types.js";
