import { fromStructured } from "./element.js";
import type { VdomElement } from "./element.js";
import { deprecate } from "./logger.js";
import type { Logger } from "./logger.js";

export interface LegacyOptions {
  logger?: Logger;
}

/**
 * Entry point for callers that used to hand a structured value to the
 * element constructor in place of a tag name.
 *
 * @deprecated Use `fromStructured`.
 */
export function fromLegacyValue(value: unknown, options: LegacyOptions = {}): VdomElement {
  deprecate(
    "Passing a structured value to the VdomElement constructor is deprecated; use fromStructured instead",
    options.logger
  );
  return fromStructured(value);
}
