/**
 * Lifecycle Module - Service Layer
 *
 * Runs the polling loops next to the metrics server until a termination
 * request arrives or the server fails, then shuts down in order:
 *
 * 1. Both loops stop at their next suspension point (an in-flight poll finishes).
 * 2. The server stops accepting scrapes; open connections get a grace period.
 * 3. Once polling has fully stopped, the router session is logged out,
 *    bounded by its own timeout.
 *
 * Steps 2 and 3 run concurrently. Shutdown errors are logged, never returned.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type FritzBoxClient,
  type FritzBoxError,
  formatFritzBoxError,
} from "../fritzbox/index.js";
import { createLogger } from "../logger.js";
import {
  type MetricsRecorder,
  collectDeviceMetrics,
  collectNetworkMetrics,
} from "../metrics/index.js";
import type { ScheduledLoop } from "../scheduler/index.js";
import { type LifecycleError, formatLifecycleError, serverFailed } from "./errors.js";
import type { LifecycleOptions } from "./schema.js";

const log = createLogger("lifecycle");

export type CollectionLoopOptions = Readonly<{
  client: FritzBoxClient;
  metrics: MetricsRecorder;
  deviceIntervalMs: number;
  networkIntervalMs: number;
}>;

/**
 * The two metric families, each polled on its own interval.
 */
export function createCollectionLoops(
  options: CollectionLoopOptions,
): ReadonlyArray<ScheduledLoop<FritzBoxError>> {
  const { client, metrics } = options;

  return [
    {
      name: "device",
      intervalMs: options.deviceIntervalMs,
      poll: (signal) => collectDeviceMetrics(client, metrics, signal),
      formatError: formatFritzBoxError,
    },
    {
      name: "network",
      intervalMs: options.networkIntervalMs,
      poll: (signal) => collectNetworkMetrics(client, metrics, signal),
      formatError: formatFritzBoxError,
    },
  ];
}

/**
 * Run until shutdown has completed.
 *
 * @returns SERVER_FAILED if the server failure triggered the shutdown
 */
export async function runLifecycle(
  options: LifecycleOptions,
): Promise<Result<void, LifecycleError>> {
  const { client, scheduler, server, signal } = options;

  const controller = new AbortController();
  const stop = () => controller.abort();
  let failure: LifecycleError | null = null;

  if (signal.aborted) {
    stop();
  } else {
    signal.addEventListener("abort", stop, { once: true });
  }

  server.onError((error) => {
    failure ??= serverFailed(error.message, error);
    log.error({ error: error.message }, "Metrics server failed");
    stop();
  });

  const polling = scheduler.start(controller.signal);

  await aborted(controller.signal);
  signal.removeEventListener("abort", stop);
  log.info("Shutting down");

  const [, closed] = await Promise.all([
    polling.then(() => logout(client, options.logoutTimeoutMs)),
    server.shutdown(options.shutdownGraceMs),
  ]);

  if (closed.isErr()) {
    log.warn({ error: formatLifecycleError(closed.error) }, "Metrics server did not close cleanly");
  } else {
    log.info("Metrics server closed");
  }

  log.info("Shutdown complete");
  return failure ? err(failure) : ok(undefined);
}

function aborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Best-effort logout. Gives up after `timeoutMs`, cancelling the request.
 */
async function logout(client: FritzBoxClient, timeoutMs: number): Promise<void> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve("timeout");
    }, timeoutMs);
  });

  try {
    const outcome = await Promise.race([client.close(controller.signal), timedOut]);

    if (outcome === "timeout") {
      log.warn({ timeoutMs }, "Logout from FRITZ!Box timed out");
    } else if (outcome.isErr()) {
      log.warn({ error: formatFritzBoxError(outcome.error) }, "Failed to log out from FRITZ!Box");
    } else {
      log.info("Logged out from FRITZ!Box");
    }
  } finally {
    clearTimeout(timer);
  }
}
