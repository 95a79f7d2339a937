/**
 * FRITZ!Box Module - HTTP Transport
 *
 * Stateless GET requests against the router. Anything but 200 is an error.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type FritzBoxError, badStatus, transportFailed } from "./errors.js";
import { type QueryParams, buildRequestUrl } from "./transform.js";

const log = createLogger("fritzbox");

export type Transport = Readonly<{
  /**
   * GET a path below the base URL and return the response body.
   */
  get(
    path: string,
    params: QueryParams,
    signal?: AbortSignal,
  ): Promise<Result<string, FritzBoxError>>;
}>;

export type TransportOptions = Readonly<{
  baseUrl: URL;
  timeoutMs: number;
}>;

/**
 * Combine the caller's signal with a per-request timeout.
 * The returned dispose function detaches from the caller's signal.
 */
function requestSignal(
  timeoutMs: number,
  signal: AbortSignal | undefined,
): { signal: AbortSignal; dispose: () => void } {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  if (!signal) {
    return { signal: timeoutSignal, dispose: () => undefined };
  }

  const controller = new AbortController();
  const abortFromCaller = () => controller.abort(signal.reason);
  const abortFromTimeout = () => controller.abort(timeoutSignal.reason);

  if (signal.aborted) {
    abortFromCaller();
  } else {
    signal.addEventListener("abort", abortFromCaller, { once: true });
  }
  timeoutSignal.addEventListener("abort", abortFromTimeout, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      signal.removeEventListener("abort", abortFromCaller);
      timeoutSignal.removeEventListener("abort", abortFromTimeout);
    },
  };
}

/**
 * Create the HTTP transport used by the session manager and readers.
 */
export function createTransport(options: TransportOptions): Transport {
  const { baseUrl, timeoutMs } = options;

  return {
    async get(path, params, signal) {
      const url = buildRequestUrl(baseUrl, path, params);
      const request = requestSignal(timeoutMs, signal);

      log.trace({ path }, "GET");

      try {
        const response = await fetch(url, {
          method: "GET",
          signal: request.signal,
        });

        if (response.status !== 200) {
          await response.body?.cancel();
          return err(badStatus(response.status, response.statusText));
        }

        return ok(await response.text());
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));

        if (cause.name === "TimeoutError") {
          return err(transportFailed(`request to ${path} timed out after ${timeoutMs}ms`, cause));
        }
        if (cause.name === "AbortError") {
          return err(transportFailed(`request to ${path} was cancelled`, cause));
        }

        return err(transportFailed(`HTTP request to ${path} failed: ${cause.message}`, cause));
      } finally {
        request.dispose();
      }
    },
  };
}
