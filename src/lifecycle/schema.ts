/**
 * Lifecycle Module - Types
 */
import type { Result } from "neverthrow";

import type { FritzBoxClient } from "../fritzbox/index.js";
import type { Scheduler } from "../scheduler/index.js";
import type { LifecycleError } from "./errors.js";

/**
 * The running metrics server, as the lifecycle sees it.
 */
export type HttpServerHandle = Readonly<{
  /** Called when the server fails to listen or crashes. */
  onError(listener: (error: Error) => void): void;
  /**
   * Stop accepting connections and wait for open ones to finish.
   * Connections still open after `graceMs` are closed forcefully.
   */
  shutdown(graceMs: number): Promise<Result<void, LifecycleError>>;
}>;

export type ListenAddress = Readonly<{ host: string; port: number }>;

export type LifecycleOptions = Readonly<{
  client: FritzBoxClient;
  scheduler: Scheduler;
  server: HttpServerHandle;
  /** Fires on a termination request */
  signal: AbortSignal;
  shutdownGraceMs: number;
  logoutTimeoutMs: number;
}>;
