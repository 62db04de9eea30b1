/**
 * Logger interface for router components.
 * Allows optional structured logging with context and message.
 */

export interface Logger {
  debug?: (ctx: object, msg: string) => void;
  info?: (ctx: object, msg: string) => void;
  warn?: (ctx: object, msg: string) => void;
  error?: (ctx: object, msg: string) => void;
}

/** Either a Logger or a factory with get(name) returning one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

function isFactory(x: LoggerFactory): x is { get(name: string): Logger } {
  return "get" in x && typeof x.get === "function";
}

/** Logger that drops everything. */
export const noopLogger: Logger = {};

/** Resolve logger from factory (supports a plain Logger or factory.get(name)). */
export function resolveLogger(factory: LoggerFactory | undefined, name: string): Logger {
  if (!factory) return noopLogger;
  return isFactory(factory) ? factory.get(name) : factory;
}
