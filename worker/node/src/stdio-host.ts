/**
 * Stdio host: serves newline-delimited JSON request envelopes from a readable
 * stream and writes one JSON line per request to a writable stream.
 *
 *   in:  {"procedure":"echo","body":{"x":1}}
 *   out: {"body":{"x":1}}
 *        {"error":"..."}                                  (handler failed)
 *        {"failure":{"code":"...","message":"..."}}       (call failed)
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { RouterError, encodeResponse, toError, type Logger } from "@procroute/core";
import type { InvokeHandler } from "./invoke.js";

const LOG_PREFIX = "procroute-worker:stdio-host";

export interface ServeLinesParams {
  input: Readable;
  output: Writable;
  invoke: InvokeHandler;
  log?: Logger;
  maxLineBytes: number;
  /** Aborting stops reading and cancels the in-flight request */
  signal?: AbortSignal;
}

export interface ServeStats {
  handled: number;
  failed: number;
}

function encodeFailure(err: unknown): string {
  const e = toError(err);
  const code = e instanceof RouterError ? e.code : "INTERNAL_ERROR";
  return JSON.stringify({ failure: { code, message: e.message } });
}

function isWritable(output: Writable): boolean {
  return output.writable && !output.destroyed && output.errored === null;
}

/** Resolves once the output drains, closes or errors. */
function waitForDrain(output: Writable): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      output.off("drain", done);
      output.off("close", done);
      output.off("error", done);
      resolve();
    };
    output.on("drain", done);
    output.on("close", done);
    output.on("error", done);
  });
}

/**
 * Serve requests in arrival order until the input ends. Resolves with counts
 * of requests answered and of call failures among them. Reading stops early
 * when the output fails (e.g. EPIPE on a closed stdout).
 */
export async function serveLines(params: ServeLinesParams): Promise<ServeStats> {
  const { input, output, invoke, log = {}, maxLineBytes, signal } = params;
  const rl = createInterface({ input, crlfDelay: Infinity });
  const stats: ServeStats = { handled: 0, failed: 0 };
  const onAbort = () => rl.close();
  signal?.addEventListener("abort", onAbort, { once: true });

  // Left attached after the loop: a failed write can report its error late.
  let outputFailed = false;
  output.on("error", (err: Error) => {
    if (outputFailed) return;
    outputFailed = true;
    log.error?.({ error: err.message }, `${LOG_PREFIX}:serveLines - Output failed, closing input`);
    rl.close();
  });

  try {
    for await (const line of rl) {
      if (!isWritable(output)) break;
      if (line.trim() === "") continue;

      let out: string;
      if (Buffer.byteLength(line, "utf8") > maxLineBytes) {
        stats.failed++;
        log.warn?.({ bytes: Buffer.byteLength(line, "utf8"), maxLineBytes }, `${LOG_PREFIX}:serveLines - Line too long`);
        out = JSON.stringify({
          failure: { code: "INVALID_REQUEST", message: `request exceeds ${maxLineBytes} bytes` },
        });
      } else {
        try {
          out = encodeResponse(await invoke(line, signal));
        } catch (err) {
          stats.failed++;
          log.warn?.({ error: toError(err).message }, `${LOG_PREFIX}:serveLines - Call failed`);
          out = encodeFailure(err);
        }
      }
      stats.handled++;
      if (!output.write(`${out}\n`)) await waitForDrain(output);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  log.info?.({ ...stats }, `${LOG_PREFIX}:serveLines - Input closed`);
  return stats;
}
