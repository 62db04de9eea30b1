/**
 * Router: multiplexes many procedures behind one entry point.
 *
 * `handle` looks up the handler for the request's procedure, invokes it and
 * wraps the outcome in a response envelope. Errors raised by a handler are not
 * propagated; they are marshaled into `RouterResponse.error`. The only
 * rejection from `handle` is UnrecognizedProcedureError.
 */

import type {
  Handler,
  HandlerContext,
  HandlerFunction,
  Payload,
  RouterRequest,
  RouterResponse,
} from "./envelope.js";
import { UnrecognizedProcedureError, toError } from "./errors.js";
import { toHandler } from "./handler.js";
import { resolveLogger, type Logger } from "./logger.js";
import { defaultSettings, type Option, type RouterSettings } from "./options.js";
import { Registry } from "./registry.js";

const LOG_PREFIX = "procroute-core:router";

export class Router {
  readonly registry: Registry;
  private readonly settings: Readonly<RouterSettings>;
  private readonly log: Logger;

  constructor(...options: Option[]) {
    const settings = defaultSettings();
    for (const opt of options) {
      opt(settings);
    }
    this.settings = Object.freeze(settings);
    this.registry = new Registry();
    this.log = resolveLogger(settings.logger, LOG_PREFIX);
  }

  /**
   * Register a handler for a procedure.
   * NOTE: If several handlers are registered to the same procedure, only the
   * last one registered is called.
   */
  route(procedure: string, handler: Handler | HandlerFunction): this {
    this.registry.register(procedure, toHandler(handler));
    return this;
  }

  /**
   * Entry point for hosts. Resolves with `{ body }` or `{ error }`; rejects
   * only when the procedure is not registered.
   */
  async handle(ctx: HandlerContext, req: RouterRequest): Promise<RouterResponse> {
    const handler = this.registry.lookup(req.procedure);
    if (!handler) {
      this.log.warn?.(
        { procedure: req.procedure, requestId: ctx.requestId },
        `${LOG_PREFIX}:handle - Unrecognized procedure`
      );
      throw new UnrecognizedProcedureError(req.procedure);
    }

    this.log.debug?.(
      { procedure: req.procedure, requestId: ctx.requestId },
      `${LOG_PREFIX}:handle - Dispatching`
    );

    let result: Payload;
    try {
      result = await handler.handle(ctx, req.body);
    } catch (thrown) {
      const err = toError(thrown);
      return { error: await this.marshal(req.procedure, err) };
    }
    return { body: result === undefined ? null : result };
  }

  private async marshal(procedure: string, err: Error): Promise<Payload> {
    try {
      const encoded = await this.settings.marshalError(err);
      return encoded === undefined ? null : encoded;
    } catch (marshalError) {
      this.log.warn?.(
        { procedure, error: err.message, marshalError: toError(marshalError).message },
        `${LOG_PREFIX}:marshal - Error marshaler failed, using message`
      );
      this.notifyMarshalFailure({ procedure, error: err, marshalError });
      return err.message;
    }
  }

  private notifyMarshalFailure(failure: {
    procedure: string;
    error: Error;
    marshalError: unknown;
  }): void {
    const listener = this.settings.onMarshalFailure;
    if (!listener) return;
    try {
      listener(failure);
    } catch (listenerError) {
      this.log.error?.(
        { procedure: failure.procedure, error: toError(listenerError).message },
        `${LOG_PREFIX}:notifyMarshalFailure - Listener threw`
      );
    }
  }
}

/**
 * Create a router with the options passed, applied in order.
 */
export function createRouter(...options: Option[]): Router {
  return new Router(...options);
}
