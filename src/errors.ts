import type { JsonSchema, ValidationIssue } from "./types.js";

export type VdomErrorCode =
  | "SCHEMA_VALIDATION"
  | "CHILD_TYPE"
  | "IMMUTABLE_MUTATION"
  | "DISALLOWED_CHILDREN"
  | "INVALID_TAG_NAME"
  | "ATTRIBUTE_TYPE";

export class VdomError extends Error {
  readonly code: VdomErrorCode;

  constructor(code: VdomErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "VdomError";
    Object.setPrototypeOf(this, VdomError.prototype);
  }
}

export class SchemaValidationError extends VdomError {
  readonly schema: JsonSchema;
  readonly issues: ValidationIssue[];

  constructor(schema: JsonSchema, issues: ValidationIssue[]) {
    const detail = issues.map((issue) => `at ${issue.path}: ${issue.message}`).join("; ");
    super("SCHEMA_VALIDATION", `value didn't match the schema: ${JSON.stringify(schema)}. ${detail}`);
    this.schema = schema;
    this.issues = issues;
    this.name = "SchemaValidationError";
    Object.setPrototypeOf(this, SchemaValidationError.prototype);
  }
}

export class ChildTypeError extends VdomError {
  readonly child: unknown;

  constructor(child: unknown) {
    super("CHILD_TYPE", "children must be text or element nodes");
    this.child = child;
    this.name = "ChildTypeError";
    Object.setPrototypeOf(this, ChildTypeError.prototype);
  }
}

export class ImmutableMutationError extends VdomError {
  readonly property: string;

  constructor(property: string | symbol) {
    const name = String(property);
    super("IMMUTABLE_MUTATION", `cannot change "${name}" of an immutable node`);
    this.property = name;
    this.name = "ImmutableMutationError";
    Object.setPrototypeOf(this, ImmutableMutationError.prototype);
  }
}

export class DisallowedChildrenError extends VdomError {
  readonly tagName: string;

  constructor(tagName: string) {
    super("DISALLOWED_CHILDREN", `<${tagName} /> cannot have children`);
    this.tagName = tagName;
    this.name = "DisallowedChildrenError";
    Object.setPrototypeOf(this, DisallowedChildrenError.prototype);
  }
}

export class InvalidTagNameError extends VdomError {
  constructor(tagName: unknown) {
    super("INVALID_TAG_NAME", `tag name must be a non-empty string, got ${JSON.stringify(tagName)}`);
    this.name = "InvalidTagNameError";
    Object.setPrototypeOf(this, InvalidTagNameError.prototype);
  }
}

export class AttributeTypeError extends VdomError {
  readonly attribute: string | undefined;

  constructor(attribute?: string) {
    super(
      "ATTRIBUTE_TYPE",
      attribute === undefined
        ? "attributes must map strings to strings"
        : `attribute "${attribute}" must have a string value`
    );
    this.attribute = attribute;
    this.name = "AttributeTypeError";
    Object.setPrototypeOf(this, AttributeTypeError.prototype);
  }
}
