/**
 * Unit tests for the invoke adapter.
 */

import { describe, it, expect, vi } from "vitest";
import { getEventListeners } from "node:events";
import { Router, UnrecognizedProcedureError, InvalidRequestError, type HandlerContext } from "@procroute/core";
import { createInvokeHandler } from "./invoke.js";

const silentLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe("createInvokeHandler", () => {
  it("should decode the event and return the handler result", async () => {
    const router = new Router().route("Do", (_ctx, body) => ({ got: body }));
    const invoke = createInvokeHandler({ router, log: silentLogger });

    await expect(invoke(`{"procedure":"Do","body":{"key":"value"}}`)).resolves.toEqual({
      body: { got: { key: "value" } },
    });
  });

  it("should accept an already-parsed event", async () => {
    const router = new Router().route("Do", () => "ok");
    const invoke = createInvokeHandler({ router });
    await expect(invoke({ procedure: "Do" })).resolves.toEqual({ body: "ok" });
  });

  it("should resolve handler errors as error responses", async () => {
    const router = new Router().route("Do", () => {
      throw new Error("boom");
    });
    const invoke = createInvokeHandler({ router });
    await expect(invoke({ procedure: "Do" })).resolves.toEqual({ error: "boom" });
  });

  it("should reject unrecognized procedures", async () => {
    const invoke = createInvokeHandler({ router: new Router() });
    await expect(invoke({ procedure: "X" })).rejects.toBeInstanceOf(UnrecognizedProcedureError);
  });

  it("should reject undecodable events", async () => {
    const invoke = createInvokeHandler({ router: new Router() });
    await expect(invoke("not json")).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("should give each invocation a request id and the caller's signal", async () => {
    const seen: HandlerContext[] = [];
    const router = new Router().route("Do", (ctx) => {
      seen.push(ctx);
      return null;
    });
    const invoke = createInvokeHandler({ router });
    const ctrl = new AbortController();

    await invoke({ procedure: "Do" }, ctrl.signal);
    await invoke({ procedure: "Do" });

    expect(seen).toHaveLength(2);
    expect(seen[0].signal).toBe(ctrl.signal);
    expect(seen[0].deadlineUnixMs).toBeUndefined();
    expect(typeof seen[0].requestId).toBe("string");
    expect(seen[0].requestId).not.toBe(seen[1].requestId);
    expect(seen[1].signal.aborted).toBe(false);
  });

  it("should abort the handler signal after the timeout", async () => {
    const router = new Router().route("wait", (ctx) => {
      return new Promise((_resolve, reject) => {
        ctx.signal.addEventListener("abort", () => reject(new Error("timed out")), { once: true });
      });
    });
    const invoke = createInvokeHandler({ router, timeoutMs: 10 });

    await expect(invoke({ procedure: "wait" })).resolves.toEqual({ error: "timed out" });
  });

  it("should not leave abort listeners on the caller's signal", async () => {
    const router = new Router().route("Do", () => null);
    const invoke = createInvokeHandler({ router, timeoutMs: 60_000 });
    const ctrl = new AbortController();

    for (let i = 0; i < 50; i++) {
      await invoke({ procedure: "Do" }, ctrl.signal);
    }
    await expect(invoke({ procedure: "Missing" }, ctrl.signal)).rejects.toThrow();

    expect(getEventListeners(ctrl.signal, "abort")).toHaveLength(0);
  });

  it("should abort the handler when the caller's signal aborts under a timeout", async () => {
    const router = new Router().route("wait", (ctx) => {
      return new Promise((_resolve, reject) => {
        ctx.signal.addEventListener("abort", () => reject(new Error("cancelled")), { once: true });
      });
    });
    const invoke = createInvokeHandler({ router, timeoutMs: 60_000 });
    const ctrl = new AbortController();

    const pending = invoke({ procedure: "wait" }, ctrl.signal);
    ctrl.abort();

    await expect(pending).resolves.toEqual({ error: "cancelled" });
    expect(getEventListeners(ctrl.signal, "abort")).toHaveLength(0);
  });

  it("should set a deadline when a timeout is configured", async () => {
    let deadline: number | undefined;
    const router = new Router().route("Do", (ctx) => {
      deadline = ctx.deadlineUnixMs;
      return null;
    });
    const before = Date.now();
    await createInvokeHandler({ router, timeoutMs: 5_000 })({ procedure: "Do" });
    expect(deadline).toBeGreaterThanOrEqual(before + 5_000);
  });

  it("should log received and completed invocations", async () => {
    const log = { info: vi.fn() };
    const router = new Router().route("Do", () => {
      throw new Error("boom");
    });
    await createInvokeHandler({ router, log })({ procedure: "Do" });

    expect(log.info).toHaveBeenCalledTimes(2);
    expect(log.info.mock.calls[0][1]).toBe("procroute-worker:invoke:invoke - Invocation received");
    expect(log.info.mock.calls[1][0]).toMatchObject({ procedure: "Do", ok: false });
    expect(log.info.mock.calls[1][1]).toBe("procroute-worker:invoke:invoke - Invocation completed");
  });
});
