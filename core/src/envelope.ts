/**
 * Request/response envelope, handler context and handler capability types.
 *
 * These types are shared between the router and the hosts that feed it.
 * Payloads are already-decoded JSON values; the router passes them through
 * without looking inside.
 */

// ── Payload ─────────────────────────────────────────────────────────

/**
 * Opaque, self-describing unit of data (a decoded JSON value).
 */
export type Payload = unknown;

// ── Envelopes ───────────────────────────────────────────────────────

/**
 * Inbound envelope: names the procedure and carries its body.
 */
export interface RouterRequest {
  readonly procedure: string;
  readonly body: Payload;
}

/** Response for a handler that completed. */
export type RouterResponseOk = {
  body: Payload;
  error?: never;
};

/** Response for a handler that failed; `error` holds the encoded error. */
export type RouterResponseErr = {
  body?: never;
  error: Payload;
};

/** Exactly one of `body` or `error` is present. */
export type RouterResponse = RouterResponseOk | RouterResponseErr;

// ── Handler Context ─────────────────────────────────────────────────

/**
 * Cancellable context handed to handlers unchanged.
 * Honoring `signal` is up to the handler.
 */
export interface HandlerContext {
  signal: AbortSignal;
  requestId?: string;
  deadlineUnixMs?: number;
  meta?: Record<string, unknown>;
}

// ── Handlers ────────────────────────────────────────────────────────

/**
 * Capability implemented by anything that can serve a procedure.
 * Failure is signalled by throwing or rejecting.
 */
export interface Handler {
  handle(ctx: HandlerContext, body: Payload): Payload | Promise<Payload>;
}

/** Plain function form of a handler. */
export type HandlerFunction = (ctx: HandlerContext, body: Payload) => Payload | Promise<Payload>;

/**
 * Converts a handler error into the payload placed in `RouterResponse.error`.
 * Throw or reject to signal that the error could not be encoded.
 */
export type ErrorMarshaler = (err: Error) => Payload | Promise<Payload>;

/**
 * Type guard for response envelopes carrying an encoded error.
 */
export function isErrorResponse(rsp: RouterResponse): rsp is RouterResponseErr {
  return "error" in rsp;
}
