/**
 * Worker process: loads config, builds the router with the sample procedures
 * and serves newline-delimited request envelopes over stdin/stdout.
 * Log lines go to stderr so stdout carries only responses.
 */

import "dotenv/config";
import { Router, withLogger } from "@procroute/core";
import { createNodeJSLogger } from "./logger.js";
import { loadConfig } from "./config.js";
import { createInvokeHandler } from "./invoke.js";
import { registerSampleProcedures } from "./procedures.js";
import { serveLines } from "./stdio-host.js";

const SERVICE_NAME = "procroute-worker";

async function main(): Promise<void> {
  const stderrSink = {
    out: (line: string) => process.stderr.write(`${line}\n`),
    err: (line: string) => process.stderr.write(`${line}\n`),
  };
  const bootLog = createNodeJSLogger(SERVICE_NAME, { sink: stderrSink }).get(`${SERVICE_NAME}:main`);
  const config = loadConfig({ log: bootLog });
  const loggerFactory = createNodeJSLogger(config.serviceName, { level: config.logLevel, sink: stderrSink });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const router = registerSampleProcedures(new Router(withLogger(loggerFactory)));
  const invoke = createInvokeHandler({
    router,
    log: loggerFactory.get(`${SERVICE_NAME}:invoke`),
    timeoutMs: config.requestTimeoutMs,
  });

  const ctrl = new AbortController();
  const shutdown = (signal: string): void => {
    log.info({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    ctrl.abort();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  log.info({ procedures: router.registry.procedures() }, `${SERVICE_NAME}:main - Started`);
  await serveLines({
    input: process.stdin,
    output: process.stdout,
    invoke,
    log: loggerFactory.get(`${SERVICE_NAME}:stdio-host`),
    maxLineBytes: config.maxLineBytes,
    signal: ctrl.signal,
  });
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
