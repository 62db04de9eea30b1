import { describe, it, expect, vi } from "vitest";
import { createNodeJSLogger } from "./logger.js";

function createSink() {
  return { out: vi.fn(), err: vi.fn() };
}

describe("createNodeJSLogger", () => {
  it("should write JSON lines with service and prefix", () => {
    const sink = createSink();
    const log = createNodeJSLogger("svc", { sink }).get("svc:main");

    log.info({ count: 2 }, "svc:main - Started");

    expect(sink.out).toHaveBeenCalledWith(
      `{"level":"info","count":2,"service":"svc","prefix":"svc:main","msg":"svc:main - Started"}`
    );
  });

  it("should send errors to the error sink", () => {
    const sink = createSink();
    createNodeJSLogger("svc", { sink }).get("p").error({}, "bad");
    expect(sink.err).toHaveBeenCalledWith(`{"level":"error","service":"svc","prefix":"p","msg":"bad"}`);
    expect(sink.out).not.toHaveBeenCalled();
  });

  it("should drop debug lines unless the level is debug", () => {
    const sink = createSink();
    createNodeJSLogger("svc", { sink }).get("p").debug({}, "hidden");
    expect(sink.out).not.toHaveBeenCalled();

    createNodeJSLogger("svc", { sink, level: "debug" }).get("p").debug({}, "shown");
    expect(sink.out).toHaveBeenCalledWith(`{"level":"debug","service":"svc","prefix":"p","msg":"shown"}`);
  });
});
