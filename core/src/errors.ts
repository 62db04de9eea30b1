/**
 * Router error classes.
 *
 * Only routing failures are raised out of `Router.handle`; errors thrown by
 * handlers are encoded into the response envelope instead.
 */

export type RouterErrorCode = "UNRECOGNIZED_PROCEDURE" | "INVALID_REQUEST" | "INVALID_RESPONSE";

/**
 * Structured error for failures of the routing layer itself.
 */
export class RouterError extends Error {
  public readonly code: RouterErrorCode;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: RouterErrorCode;
    message: string;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "RouterError";
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
  }
}

/**
 * Raised when no handler is bound to the requested procedure.
 */
export class UnrecognizedProcedureError extends RouterError {
  public readonly procedure: string;

  constructor(procedure: string) {
    super({
      code: "UNRECOGNIZED_PROCEDURE",
      message: `unrecognized procedure '${procedure}'`,
    });
    this.name = "UnrecognizedProcedureError";
    this.procedure = procedure;
  }
}

/**
 * Raised when an inbound event cannot be decoded into a request envelope.
 */
export class InvalidRequestError extends RouterError {
  constructor(args: { message: string; details?: unknown; cause?: unknown }) {
    super({ code: "INVALID_REQUEST", ...args });
    this.name = "InvalidRequestError";
  }
}

/**
 * Raised when a response envelope cannot be encoded as JSON.
 */
export class InvalidResponseError extends RouterError {
  constructor(args: { message: string; cause?: unknown }) {
    super({ code: "INVALID_RESPONSE", ...args });
    this.name = "InvalidResponseError";
  }
}

/**
 * Normalizes a thrown value to an Error. Never throws: values that cannot be
 * converted with String() (null-prototype objects, a throwing toString) fall
 * back to their Object.prototype.toString tag.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  try {
    return new Error(String(value));
  } catch {
    return new Error(Object.prototype.toString.call(value));
  }
}
