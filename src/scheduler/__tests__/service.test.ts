/**
 * Scheduler Tests
 *
 * Polling loops under fake timers.
 */
import { err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const mockLog = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  trace: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => mockLog,
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
}));

// Import after mocks
import type { LoopState, PollFn } from "../schema.js";
import { createScheduler, runPollingLoop } from "../service.js";

const INTERVAL_MS = 1000;

function startLoop(poll: PollFn<string>, controller = new AbortController()) {
  const states: LoopState[] = [];
  let stopped = false;
  const done = runPollingLoop({
    name: "device",
    intervalMs: INTERVAL_MS,
    poll,
    signal: controller.signal,
    formatError: (error) => error,
    onStateChange: (state) => states.push(state),
  }).then(() => {
    stopped = true;
  });

  return { controller, states, done, isStopped: () => stopped };
}

/**
 * A poll that takes `durationMs` and records when it ran.
 */
function slowPoll(durationMs: number) {
  const starts: number[] = [];
  let inFlight = 0;
  let maxInFlight = 0;

  const poll = vi.fn<PollFn<string>>(async () => {
    starts.push(Date.now());
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await new Promise((resolve) => setTimeout(resolve, durationMs));
    inFlight--;
    return ok(undefined);
  });

  return { poll, starts, maxInFlight: () => maxInFlight };
}

describe("Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // runPollingLoop
  // ===========================================================================

  describe("runPollingLoop", () => {
    test("polls immediately on start", async () => {
      // Arrange
      const poll = vi.fn<PollFn<string>>().mockResolvedValue(ok(undefined));

      // Act
      const loop = startLoop(poll);

      // Assert
      expect(poll).toHaveBeenCalledTimes(1);

      loop.controller.abort();
      await loop.done;
    });

    test("polls again after every interval", async () => {
      // Arrange
      const poll = vi.fn<PollFn<string>>().mockResolvedValue(ok(undefined));
      const loop = startLoop(poll);

      // Act & Assert
      await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
      expect(poll).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(poll).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(poll).toHaveBeenCalledTimes(3);

      loop.controller.abort();
      await loop.done;
    });

    test("never overlaps polls and serves missed ticks once", async () => {
      // Arrange
      const { poll, starts, maxInFlight } = slowPoll(2500);
      const loop = startLoop(poll);

      // Act
      await vi.advanceTimersByTimeAsync(4999);

      // Assert
      expect(starts).toEqual([0, 2500]);
      expect(maxInFlight()).toBe(1);

      loop.controller.abort();
      await vi.advanceTimersByTimeAsync(2500);
      await loop.done;
    });

    test("stops on abort and never polls again", async () => {
      // Arrange
      const poll = vi.fn<PollFn<string>>().mockResolvedValue(ok(undefined));
      const loop = startLoop(poll);
      await vi.advanceTimersByTimeAsync(0);

      // Act
      loop.controller.abort();
      await loop.done;
      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 5);

      // Assert
      expect(poll).toHaveBeenCalledTimes(1);
      expect(loop.states).toEqual(["polling", "idle", "stopped"]);
      expect(vi.getTimerCount()).toBe(0);
    });

    test("waits for an in-flight poll before stopping", async () => {
      // Arrange
      const { poll } = slowPoll(1000);
      const loop = startLoop(poll);

      // Act
      await vi.advanceTimersByTimeAsync(100);
      loop.controller.abort();
      await vi.advanceTimersByTimeAsync(100);

      // Assert
      expect(loop.isStopped()).toBe(false);
      expect(poll.mock.calls[0]?.[0].aborted).toBe(true);

      await vi.advanceTimersByTimeAsync(800);
      expect(loop.isStopped()).toBe(true);
      expect(poll).toHaveBeenCalledTimes(1);
    });

    test("logs a failed poll and keeps polling", async () => {
      // Arrange
      const poll = vi
        .fn<PollFn<string>>()
        .mockResolvedValueOnce(err("router unreachable"))
        .mockResolvedValue(ok(undefined));
      const loop = startLoop(poll);

      // Act
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      // Assert
      expect(poll).toHaveBeenCalledTimes(2);
      expect(mockLog.error).toHaveBeenCalledWith(
        { loop: "device", error: "router unreachable" },
        "Failed to fetch device metrics",
      );

      loop.controller.abort();
      await loop.done;
    });

    test("keeps polling after a poll throws", async () => {
      // Arrange
      const poll = vi
        .fn<PollFn<string>>()
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValue(ok(undefined));
      const loop = startLoop(poll);

      // Act
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      // Assert
      expect(poll).toHaveBeenCalledTimes(2);
      expect(mockLog.error).toHaveBeenCalledWith(
        { loop: "device", error: "boom" },
        "Poll cycle for device metrics crashed",
      );

      loop.controller.abort();
      await loop.done;
    });

    test("does not report errors caused by cancellation", async () => {
      // Arrange
      const controller = new AbortController();
      const poll = vi.fn<PollFn<string>>(async (signal) => {
        await new Promise((resolve) => setTimeout(resolve, 100));
        return signal.aborted ? err("request was cancelled") : ok(undefined);
      });
      const loop = startLoop(poll, controller);

      // Act
      controller.abort();
      await vi.advanceTimersByTimeAsync(100);
      await loop.done;

      // Assert
      expect(mockLog.error).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // createScheduler
  // ===========================================================================

  describe("createScheduler", () => {
    function loops() {
      return [
        {
          name: "device",
          intervalMs: 300_000,
          poll: vi.fn<PollFn<string>>().mockResolvedValue(ok(undefined)),
          formatError: (error: string) => error,
        },
        {
          name: "network",
          intervalMs: 100_000,
          poll: vi.fn<PollFn<string>>().mockResolvedValue(ok(undefined)),
          formatError: (error: string) => error,
        },
      ];
    }

    test("reports every loop idle before start", () => {
      const scheduler = createScheduler(loops());

      expect(scheduler.getState()).toEqual({ device: "idle", network: "idle" });
    });

    test("runs the loops on their own intervals", async () => {
      // Arrange
      const [device, network] = loops();
      if (!device || !network) throw new Error("missing loops");
      const scheduler = createScheduler([device, network]);
      const controller = new AbortController();

      // Act
      const done = scheduler.start(controller.signal);
      await vi.advanceTimersByTimeAsync(300_000);

      // Assert
      expect(device.poll).toHaveBeenCalledTimes(2);
      expect(network.poll).toHaveBeenCalledTimes(4);

      controller.abort();
      await done;
    });

    test("resolves once every loop has stopped", async () => {
      // Arrange
      const scheduler = createScheduler(loops());
      const controller = new AbortController();
      const done = scheduler.start(controller.signal);
      await vi.advanceTimersByTimeAsync(0);

      // Act
      controller.abort();
      await done;

      // Assert
      expect(scheduler.getState()).toEqual({ device: "stopped", network: "stopped" });
    });

    test("returns the running loops when started twice", async () => {
      // Arrange
      const scheduler = createScheduler(loops());
      const controller = new AbortController();

      // Act
      const first = scheduler.start(controller.signal);
      const second = scheduler.start(controller.signal);

      // Assert
      expect(second).toBe(first);

      controller.abort();
      await first;
    });
  });
});
