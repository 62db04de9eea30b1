/**
 * Invoke adapter: the host-facing entry point. Decodes a wire event, builds
 * the handler context and hands the request to the router.
 */

import { randomUUID } from "node:crypto";
import {
  decodeRequest,
  isErrorResponse,
  type HandlerContext,
  type Logger,
  type Router,
  type RouterResponse,
} from "@procroute/core";

const LOG_PREFIX = "procroute-worker:invoke";

export type InvokeHandler = (event: unknown, signal?: AbortSignal) => Promise<RouterResponse>;

export interface InvokeHandlerParams {
  router: Router;
  log?: Logger;
  /** Abort the handler's signal after this many ms */
  timeoutMs?: number;
}

interface ComposedSignal {
  signal: AbortSignal;
  /** Detach listeners added to the caller's signal */
  dispose: () => void;
}

/**
 * Combines multiple AbortSignals into one.
 * Returns immediately if any signal is already aborted.
 */
function anySignal(signals: AbortSignal[]): ComposedSignal {
  const ctrl = new AbortController();
  const detach: Array<() => void> = [];
  const dispose = (): void => {
    for (const fn of detach.splice(0)) fn();
  };
  for (const s of signals) {
    if (s.aborted) {
      dispose();
      return { signal: s, dispose: () => {} };
    }
    const onAbort = (): void => {
      dispose();
      ctrl.abort(s.reason);
    };
    s.addEventListener("abort", onAbort, { once: true });
    detach.push(() => s.removeEventListener("abort", onAbort));
  }
  return { signal: ctrl.signal, dispose };
}

function composeSignal(signal: AbortSignal | undefined, timeoutMs: number | undefined): ComposedSignal {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
  if (signals.length === 0) return { signal: new AbortController().signal, dispose: () => {} };
  return signals.length === 1 ? { signal: signals[0], dispose: () => {} } : anySignal(signals);
}

/**
 * Create the function a host calls per invocation event. Rejects when the
 * event cannot be decoded or names an unregistered procedure; handler errors
 * resolve as `{ error }` responses.
 */
export function createInvokeHandler(params: InvokeHandlerParams): InvokeHandler {
  const { router, log = {}, timeoutMs } = params;

  return async (event, signal) => {
    const req = decodeRequest(event);
    const requestId = randomUUID();
    const composed = composeSignal(signal, timeoutMs);
    const ctx: HandlerContext = {
      signal: composed.signal,
      requestId,
      deadlineUnixMs: timeoutMs !== undefined ? Date.now() + timeoutMs : undefined,
    };

    log.info?.({ procedure: req.procedure, requestId }, `${LOG_PREFIX}:invoke - Invocation received`);
    const startedAt = Date.now();
    let rsp: RouterResponse;
    try {
      rsp = await router.handle(ctx, req);
    } finally {
      composed.dispose();
    }
    log.info?.(
      { procedure: req.procedure, requestId, ok: !isErrorResponse(rsp), durationMs: Date.now() - startedAt },
      `${LOG_PREFIX}:invoke - Invocation completed`
    );
    return rsp;
  };
}
