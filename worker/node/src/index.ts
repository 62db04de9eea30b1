/**
 * Worker host: logger, configuration, invoke adapter and stdio host.
 */

export { loadConfig, defaultWorkerConfig } from "./config.js";
export type { WorkerConfig } from "./config.js";
export { createNodeJSLogger } from "./logger.js";
export type { LogLevel, LogMethod, LogSink, LoggerInstance } from "./logger.js";
export { createInvokeHandler } from "./invoke.js";
export type { InvokeHandler, InvokeHandlerParams } from "./invoke.js";
export { serveLines } from "./stdio-host.js";
export type { ServeLinesParams, ServeStats } from "./stdio-host.js";
export { echo, SumHandler, registerSampleProcedures } from "./procedures.js";
