/**
 * Scheduler Module - Service Layer
 *
 * Independent polling loops sharing one cancellation signal.
 * Each loop polls once right away, then once per interval tick. A loop never
 * runs two polls at once: ticks that fire during a poll collapse into one
 * pending tick, which is served as soon as the poll returns.
 */
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import type { LoopState, PollingLoopOptions, SchedulerState } from "./schema.js";

const log = createLogger("scheduler");

/**
 * Run one polling loop until the signal fires.
 * Resolves once the loop has stopped; an in-flight poll is awaited first.
 */
export async function runPollingLoop<E>(options: PollingLoopOptions<E>): Promise<void> {
  const { name, intervalMs, poll, signal, formatError, onStateChange } = options;

  let tickPending = true; // first poll right away
  let wake: (() => void) | null = null;

  const timer = setInterval(() => {
    tickPending = true;
    wake?.();
  }, intervalMs);
  const onAbort = () => wake?.();
  signal.addEventListener("abort", onAbort, { once: true });

  log.info({ loop: name, intervalMs }, `Monitoring ${name} metrics`);

  try {
    while (!signal.aborted) {
      if (!tickPending) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
        continue;
      }

      tickPending = false;
      onStateChange?.("polling");
      await runPoll(name, poll, signal, formatError);
      onStateChange?.("idle");
    }
  } finally {
    clearInterval(timer);
    signal.removeEventListener("abort", onAbort);
    onStateChange?.("stopped");
    log.info({ loop: name }, `${name} monitoring stopped`);
  }
}

async function runPoll<E>(
  name: string,
  poll: PollingLoopOptions<E>["poll"],
  signal: AbortSignal,
  formatError: (error: E) => string,
): Promise<void> {
  const operation = `poll:${name}`;
  const start = Date.now();
  logOperationStart(log, operation);

  try {
    const result = await poll(signal);

    if (result.isOk()) {
      logOperationComplete(log, operation, start);
    } else if (!signal.aborted) {
      log.error(
        { loop: name, error: formatError(result.error) },
        `Failed to fetch ${name} metrics`,
      );
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ loop: name, error: message }, `Poll cycle for ${name} metrics crashed`);
  }
}

// =============================================================================
// Scheduler
// =============================================================================

export type Scheduler = Readonly<{
  /**
   * Run every loop concurrently against the signal.
   * Resolves when all loops have stopped; later calls return the same run.
   */
  start(signal: AbortSignal): Promise<void>;
  getState(): SchedulerState;
}>;

export type ScheduledLoop<E> = Omit<PollingLoopOptions<E>, "signal" | "onStateChange">;

export function createScheduler<E>(loops: ReadonlyArray<ScheduledLoop<E>>): Scheduler {
  const states = new Map<string, LoopState>(
    loops.map((loop): [string, LoopState] => [loop.name, "idle"]),
  );
  let run: Promise<void> | null = null;

  return {
    start(signal) {
      run ??= Promise.all(
        loops.map((loop) =>
          runPollingLoop({
            ...loop,
            signal,
            onStateChange: (state) => states.set(loop.name, state),
          }),
        ),
      ).then(() => undefined);
      return run;
    },

    getState: () => Object.fromEntries(states),
  };
}
