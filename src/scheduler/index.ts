/**
 * Scheduler Module - Public API
 */

// Types
export type { LoopState, PollFn, PollingLoopOptions, SchedulerState } from "./schema.js";
export type { ScheduledLoop, Scheduler } from "./service.js";

// Service functions
export { createScheduler, runPollingLoop } from "./service.js";
