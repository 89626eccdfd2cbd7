/**
 * Console-backed logger.
 * Everything but `error` is silent when NODE_ENV is "production".
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

type ConsoleMethod = "debug" | "info" | "warn" | "error";

function isProduction(): boolean {
  return typeof process !== "undefined" && process.env.NODE_ENV === "production";
}

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === "undefined") return;
  console[method](...args);
}

export const logger: Logger = {
  debug: (...args) => {
    if (isProduction()) return;
    callConsole("debug", args);
  },

  info: (...args) => {
    if (isProduction()) return;
    callConsole("info", args);
  },

  warn: (...args) => {
    if (isProduction()) return;
    callConsole("warn", args);
  },

  error: (...args) => {
    callConsole("error", args);
  },
};

export function deprecate(message: string, target: Logger = logger): void {
  target.warn(`[vdom-tree] DeprecationWarning: ${message}`);
}
