/**
 * Router construction options.
 *
 * Options are applied in the order given to the Router constructor; each one
 * mutates the settings before they are frozen. Later options override earlier
 * ones touching the same setting.
 */

import type { ErrorMarshaler } from "./envelope.js";
import type { LoggerFactory } from "./logger.js";

/**
 * Reported when the configured marshaler fails and the router falls back to
 * the handler error's message.
 */
export interface MarshalFailure {
  procedure: string;
  /** The error the handler raised. */
  error: Error;
  /** What the marshaler threw. */
  marshalError: unknown;
}

export type MarshalFailureListener = (failure: MarshalFailure) => void;

export interface RouterSettings {
  marshalError: ErrorMarshaler;
  onMarshalFailure?: MarshalFailureListener;
  logger?: LoggerFactory;
}

export type Option = (settings: RouterSettings) => void;

/** Default marshaler: the error's message. Never fails. */
export const marshalErrorMessage: ErrorMarshaler = (err) => err.message;

export function defaultSettings(): RouterSettings {
  return { marshalError: marshalErrorMessage };
}

/**
 * Encode handler errors with `fn` instead of the bare message, e.g. to include
 * a code or details carried by your error type. If `fn` throws or rejects,
 * the router uses the original error's message.
 */
export function marshalErrorsWith(fn: ErrorMarshaler): Option {
  return (settings) => {
    settings.marshalError = fn;
  };
}

/**
 * Observe marshaler failures. The listener cannot change the response; if it
 * throws, the exception is dropped.
 */
export function onMarshalFailure(listener: MarshalFailureListener): Option {
  return (settings) => {
    settings.onMarshalFailure = listener;
  };
}

export function withLogger(logger: LoggerFactory): Option {
  return (settings) => {
    settings.logger = logger;
  };
}
