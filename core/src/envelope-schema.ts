/**
 * Zod runtime schemas for the request and response wire envelopes.
 *
 * These schemas mirror the TypeScript types in envelope.ts and validate
 * events handed over by a host before they reach the router.
 *
 * @see envelope.ts for the canonical TypeScript types.
 */

import { z } from "zod";

/**
 * `{ "procedure": string, "body": any }`. A missing procedure decodes to the
 * empty string and a missing body to null; extra fields are stripped.
 */
export const RouterRequestSchema = z.object({
  procedure: z.string().default(""),
  body: z.unknown().transform((body) => (body === undefined ? null : body)),
});

/**
 * `{ "body": any }` or `{ "error": any }`, never both and never neither.
 */
export const RouterResponseSchema = z.union([
  z.object({ body: z.unknown(), error: z.undefined() }).strict(),
  z.object({ error: z.unknown(), body: z.undefined() }).strict(),
]).refine(
  (rsp) => ("body" in rsp) !== ("error" in rsp),
  { message: "Exactly one of body or error must be present" }
);

export type RouterRequestWire = z.input<typeof RouterRequestSchema>;
export type RouterResponseWire = z.input<typeof RouterResponseSchema>;
