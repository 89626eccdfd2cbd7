import { SchemaValidationError } from "./errors.js";
import type { JsonSchema, ValidationIssue, ValidationResult } from "./types.js";
import { hasOwn, isPlainObject } from "./utils.js";

interface ValidationContext {
  root: JsonSchema;
  issues: ValidationIssue[];
}

const ROOT_PATH = "$value";

export function validateValue(value: unknown, schema: JsonSchema): ValidationResult {
  const context: ValidationContext = { root: schema, issues: [] };
  checkValue(value, schema, ROOT_PATH, context);

  if (context.issues.length === 0) {
    return { valid: true };
  }
  return { valid: false, issues: context.issues };
}

export function validateData(value: unknown, schema: JsonSchema): void {
  const result = validateValue(value, schema);
  if (!result.valid) {
    throw new SchemaValidationError(schema, result.issues);
  }
}

function report(context: ValidationContext, path: string, message: string): void {
  context.issues.push({ path, message });
}

function checkValue(value: unknown, schema: JsonSchema, path: string, context: ValidationContext): void {
  if (typeof schema.$ref === "string") {
    const target = resolveRef(context.root, schema.$ref);
    if (!target) {
      report(context, path, `unresolvable $ref ${schema.$ref}`);
      return;
    }
    checkValue(value, target, path, context);
  }

  const type = schema.type;
  if (Array.isArray(type)) {
    const types = type.filter((entry): entry is string => typeof entry === "string");
    if (!types.some((entry) => matchesType(value, entry))) {
      report(context, path, `expected ${types.join(" or ")}`);
      return;
    }
  } else if (typeof type === "string") {
    if (!matchesType(value, type)) {
      report(context, path, `expected ${type}`);
      return;
    }
  }

  if (Array.isArray(schema.enum)) {
    if (!schema.enum.some((entry) => Object.is(entry, value))) {
      report(context, path, "value is not in enum");
    }
  }

  if (hasOwn(schema, "const")) {
    if (!Object.is(schema.const, value)) {
      report(context, path, "value is not const");
    }
  }

  if (Array.isArray(schema.oneOf)) {
    checkOneOf(value, schema.oneOf, path, context);
  }

  if (Array.isArray(schema.anyOf)) {
    checkAnyOf(value, schema.anyOf, path, context);
  }

  if (typeof value === "string") {
    checkStringConstraints(value, schema, path, context);
    if (typeof schema.format === "string") {
      checkStringFormat(value, schema.format, path, context);
    }
  }

  if (typeof value === "number") {
    checkNumberConstraints(value, schema, path, context);
  }

  if (isPlainObject(value)) {
    checkObject(value, schema, path, context);
  }

  if (Array.isArray(value)) {
    checkArray(value, schema, path, context);
  }
}

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case "object":
      return isPlainObject(value);
    case "array":
      return Array.isArray(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && !Number.isNaN(value);
    case "null":
      return value === null;
    default:
      return typeof value === type;
  }
}

function resolveRef(root: JsonSchema, ref: string): JsonSchema | undefined {
  if (ref === "#") return root;
  if (!ref.startsWith("#/")) return undefined;

  let cursor: unknown = root;
  for (const raw of ref.slice(2).split("/")) {
    const segment = raw.replaceAll("~1", "/").replaceAll("~0", "~");
    if (!isPlainObject(cursor) || !hasOwn(cursor, segment)) {
      return undefined;
    }
    cursor = cursor[segment];
  }

  return isPlainObject(cursor) ? cursor : undefined;
}

function countMatches(value: unknown, branches: unknown[], path: string, context: ValidationContext): number {
  let matches = 0;
  for (const branch of branches) {
    if (!isPlainObject(branch)) continue;
    const scratch: ValidationContext = { root: context.root, issues: [] };
    checkValue(value, branch, path, scratch);
    if (scratch.issues.length === 0) matches++;
  }
  return matches;
}

function checkOneOf(value: unknown, branches: unknown[], path: string, context: ValidationContext): void {
  const matches = countMatches(value, branches, path, context);
  if (matches === 0) {
    report(context, path, "value does not match any oneOf branch");
  } else if (matches > 1) {
    report(context, path, "value matches more than one oneOf branch");
  }
}

function checkAnyOf(value: unknown, branches: unknown[], path: string, context: ValidationContext): void {
  if (countMatches(value, branches, path, context) === 0) {
    report(context, path, "value does not match any anyOf branch");
  }
}

function checkObject(
  value: Record<string, unknown>,
  schema: JsonSchema,
  path: string,
  context: ValidationContext
): void {
  const required = Array.isArray(schema.required)
    ? schema.required.filter((entry): entry is string => typeof entry === "string")
    : [];
  const properties: Record<string, unknown> = isPlainObject(schema.properties) ? schema.properties : {};

  for (const key of required) {
    if (!hasOwn(value, key) || value[key] === undefined) {
      report(context, `${path}.${key}`, "required property missing");
    }
  }

  for (const [key, nested] of Object.entries(value)) {
    const propSchema = hasOwn(properties, key) ? properties[key] : undefined;
    if (isPlainObject(propSchema)) {
      checkValue(nested, propSchema, `${path}.${key}`, context);
      continue;
    }

    const extra = schema.additionalProperties;
    if (extra === false) {
      report(context, `${path}.${key}`, "additional property not allowed");
    } else if (isPlainObject(extra)) {
      checkValue(nested, extra, `${path}.${key}`, context);
    }
  }
}

function checkArray(value: unknown[], schema: JsonSchema, path: string, context: ValidationContext): void {
  const items = schema.items;
  if (!isPlainObject(items)) {
    return;
  }

  value.forEach((item, index) => {
    checkValue(item, items, `${path}[${index}]`, context);
  });
}

function checkStringConstraints(value: string, schema: JsonSchema, path: string, context: ValidationContext): void {
  if (typeof schema.minLength === "number" && value.length < schema.minLength) {
    report(context, path, "shorter than minLength");
  }

  if (typeof schema.maxLength === "number" && value.length > schema.maxLength) {
    report(context, path, "longer than maxLength");
  }

  if (typeof schema.pattern === "string") {
    const regex = new RegExp(schema.pattern);
    if (!regex.test(value)) {
      report(context, path, "pattern mismatch");
    }
  }
}

function checkNumberConstraints(value: number, schema: JsonSchema, path: string, context: ValidationContext): void {
  if (typeof schema.minimum === "number" && value < schema.minimum) {
    report(context, path, "smaller than minimum");
  }
  if (typeof schema.maximum === "number" && value > schema.maximum) {
    report(context, path, "larger than maximum");
  }
  if (typeof schema.exclusiveMinimum === "number" && value <= schema.exclusiveMinimum) {
    report(context, path, "not greater than exclusiveMinimum");
  }
  if (typeof schema.exclusiveMaximum === "number" && value >= schema.exclusiveMaximum) {
    report(context, path, "not less than exclusiveMaximum");
  }
  if (typeof schema.multipleOf === "number" && value % schema.multipleOf !== 0) {
    report(context, path, "not multipleOf");
  }
}

function checkStringFormat(value: string, format: string, path: string, context: ValidationContext): void {
  const formatRegex: Record<string, RegExp> = {
    date: /^\d{4}-\d{2}-\d{2}$/,
    time: /^\d{2}:\d{2}(:\d{2})?$/,
    "date-time": /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?$/,
  };

  const regex = hasOwn(formatRegex, format) ? formatRegex[format] : undefined;
  if (regex && !regex.test(value)) {
    report(context, path, `invalid format ${format}`);
  }
}
