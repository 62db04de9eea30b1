import type { Handler, HandlerFunction } from "./envelope.js";

/**
 * Adapts an ordinary function to the Handler interface.
 * `handlerFunc(f).handle(ctx, body)` calls `f(ctx, body)`.
 */
export function handlerFunc(fn: HandlerFunction): Handler {
  return { handle: (ctx, body) => fn(ctx, body) };
}

/**
 * Type guard distinguishing Handler objects from plain functions.
 */
export function isHandler(x: Handler | HandlerFunction): x is Handler {
  return typeof x === "object" && x !== null && typeof x.handle === "function";
}

/**
 * Accepts either form and returns a Handler.
 */
export function toHandler(x: Handler | HandlerFunction): Handler {
  return isHandler(x) ? x : handlerFunc(x);
}
