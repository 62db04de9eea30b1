// Types & envelope
export * from "./envelope.js";

// Envelope Zod schemas (runtime validation)
export {
  RouterRequestSchema,
  RouterResponseSchema,
  type RouterRequestWire,
  type RouterResponseWire,
} from "./envelope-schema.js";

// Errors
export * from "./errors.js";

// Handlers & registry
export { handlerFunc, isHandler, toHandler } from "./handler.js";
export { Registry } from "./registry.js";

// Router & options
export { Router, createRouter } from "./router.js";
export {
  marshalErrorsWith,
  marshalErrorMessage,
  onMarshalFailure,
  withLogger,
  type Option,
  type RouterSettings,
  type MarshalFailure,
  type MarshalFailureListener,
} from "./options.js";

// Logger
export { type Logger, type LoggerFactory, noopLogger, resolveLogger } from "./logger.js";

// Wire codec (JSON text)
export * from "./wire.js";
