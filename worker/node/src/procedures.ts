/**
 * Sample procedures served by the worker entry point.
 */

import { z } from "zod";
import type { Handler, HandlerContext, Payload, Router } from "@procroute/core";

const SumParamsSchema = z.object({ values: z.array(z.number()) });

/** Returns the body as received. */
export const echo: Handler = {
  handle: (_ctx: HandlerContext, body: Payload) => body,
};

/** `{ values: number[] }` → `{ sum: number }`. */
export class SumHandler implements Handler {
  handle(_ctx: HandlerContext, body: Payload): { sum: number } {
    const parsed = SumParamsSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`invalid sum params: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return { sum: parsed.data.values.reduce((acc, n) => acc + n, 0) };
  }
}

export function registerSampleProcedures(router: Router): Router {
  return router.route("echo", echo).route("sum", new SumHandler());
}
