/**
 * Structured JSON-line logger for the worker. Matches the Logger interface the
 * router accepts (level methods taking structured context + message).
 */

import type { Logger } from "@procroute/core";

export type LogLevel = "debug" | "info";

export type LogMethod = (ctx: object, msg: string) => void;

export interface LoggerInstance extends Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LogSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function format(level: string, ctx: object, msg: string): string {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  return JSON.stringify({ level, ...payload });
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger instance; every line carries the service and prefix.
 * `debug` lines are dropped unless the level is "debug".
 */
export function createNodeJSLogger(
  serviceName: string,
  opts: { level?: LogLevel; sink?: LogSink } = {}
): { get: (prefix: string) => LoggerInstance } {
  const sink = opts.sink ?? consoleSink;
  const level = opts.level ?? "info";
  return {
    get(prefix: string) {
      const base = { service: serviceName, prefix };
      return {
        debug: (ctx, msg) => {
          if (level === "debug") sink.out(format("debug", { ...ctx, ...base }, msg));
        },
        info: (ctx, msg) => sink.out(format("info", { ...ctx, ...base }, msg)),
        warn: (ctx, msg) => sink.out(format("warn", { ...ctx, ...base }, msg)),
        error: (ctx, msg) => sink.err(format("error", { ...ctx, ...base }, msg)),
      };
    },
  };
}
