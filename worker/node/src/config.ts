/**
 * Worker host configuration, read from the environment.
 * Env: SERVICE_NAME, LOG_LEVEL, MAX_LINE_BYTES, REQUEST_TIMEOUT_MS.
 */

import type { Logger } from "@procroute/core";
import type { LogLevel } from "./logger.js";

const LOG_PREFIX = "procroute-worker:config";

export interface WorkerConfig {
  /** Service name stamped on every log line */
  serviceName: string;
  /** Minimum level written by the logger */
  logLevel: LogLevel;
  /** Largest request line the stdio host accepts, in bytes */
  maxLineBytes: number;
  /** When set, handlers' signals are aborted after this many ms */
  requestTimeoutMs?: number;
}

export const defaultWorkerConfig = {
  serviceName: "procedure-router",
  logLevel: "info",
  maxLineBytes: 1_048_576,
} as const satisfies WorkerConfig;

function parsePositiveInt(
  name: string,
  value: string | undefined,
  log: Logger
): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (Number.isInteger(n) && n > 0) return n;
  log.warn?.({ name, value }, `${LOG_PREFIX}:loadConfig - Ignoring invalid integer`);
  return undefined;
}

function parseLogLevel(value: string | undefined, log: Logger): LogLevel {
  if (value === undefined || value === "") return defaultWorkerConfig.logLevel;
  if (value === "debug" || value === "info") return value;
  log.warn?.({ name: "LOG_LEVEL", value }, `${LOG_PREFIX}:loadConfig - Ignoring invalid log level`);
  return defaultWorkerConfig.logLevel;
}

/**
 * Load config from environment variables (process.env unless `env` is given).
 * Invalid values fall back to defaults with a warning.
 */
export function loadConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): WorkerConfig {
  const env = params.env ?? process.env;
  const log = params.log ?? console;

  return {
    serviceName: env.SERVICE_NAME || defaultWorkerConfig.serviceName,
    logLevel: parseLogLevel(env.LOG_LEVEL, log),
    maxLineBytes:
      parsePositiveInt("MAX_LINE_BYTES", env.MAX_LINE_BYTES, log) ?? defaultWorkerConfig.maxLineBytes,
    requestTimeoutMs: parsePositiveInt("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, log),
  };
}
