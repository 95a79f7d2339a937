/**
 * Scheduler Module - Schemas and Types
 *
 * Each polling loop moves Idle -> Polling -> (Idle | Stopped).
 * Stopped is terminal; a stopped loop is never restarted.
 */
import type { Result } from "neverthrow";

export type LoopState = "idle" | "polling" | "stopped";

/**
 * One poll cycle. Errors are reported, never thrown.
 */
export type PollFn<E> = (signal: AbortSignal) => Promise<Result<unknown, E>>;

export type PollingLoopOptions<E> = Readonly<{
  /** Name used in logs and state reports, e.g. "devices" */
  name: string;
  intervalMs: number;
  poll: PollFn<E>;
  /** Stops the loop at its next suspension point */
  signal: AbortSignal;
  /** Renders a poll error for the log */
  formatError: (error: E) => string;
  onStateChange?: (state: LoopState) => void;
}>;

export type SchedulerState = Readonly<Record<string, LoopState>>;
