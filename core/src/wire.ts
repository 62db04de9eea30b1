/**
 * Wire codec for router envelopes (JSON text).
 *
 * Request:  {"procedure":"Do","body":{...}}
 * Response: {"body":{...}} or {"error":...}
 */

import { isErrorResponse, type RouterRequest, type RouterResponse } from "./envelope.js";
import { RouterRequestSchema, RouterResponseSchema } from "./envelope-schema.js";
import { InvalidRequestError, InvalidResponseError } from "./errors.js";

function parseJson(input: string | Uint8Array): unknown {
  const text = typeof input === "string" ? input : new TextDecoder().decode(input);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InvalidRequestError({ message: "Invalid JSON body", cause: err });
  }
}

/**
 * Decode an inbound event into a request envelope. Accepts JSON text, JSON
 * bytes, or an already-parsed object. The body is passed through as decoded.
 */
export function decodeRequest(input: unknown): RouterRequest {
  const raw = typeof input === "string" || input instanceof Uint8Array ? parseJson(input) : input;
  const parsed = RouterRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRequestError({
      message: "Invalid request envelope",
      details: parsed.error.flatten(),
    });
  }
  return Object.freeze({ procedure: parsed.data.procedure, body: parsed.data.body });
}

function encodePayload(field: "body" | "error", payload: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(payload);
  } catch (err) {
    throw new InvalidResponseError({ message: `Response ${field} is not JSON-encodable`, cause: err });
  }
  // functions, symbols and undefined have no JSON form
  if (json === undefined) {
    throw new InvalidResponseError({ message: `Response ${field} is not JSON-encodable` });
  }
  return json;
}

/**
 * Encode a response envelope as JSON text. The absent field is omitted.
 * Throws InvalidResponseError when the payload has no JSON form (functions,
 * symbols, BigInt, cycles) so the output always carries exactly one field.
 */
export function encodeResponse(rsp: RouterResponse): string {
  return isErrorResponse(rsp)
    ? `{"error":${encodePayload("error", rsp.error)}}`
    : `{"body":${encodePayload("body", rsp.body)}}`;
}

/**
 * Decode a response envelope, e.g. on the calling side of a host.
 */
export function decodeResponse(input: unknown): RouterResponse {
  const raw = typeof input === "string" || input instanceof Uint8Array ? parseJson(input) : input;
  const parsed = RouterResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRequestError({
      message: "Invalid response envelope",
      details: parsed.error.flatten(),
    });
  }
  const rsp = parsed.data;
  return "error" in rsp ? { error: rsp.error } : { body: rsp.body };
}
