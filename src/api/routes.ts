/**
 * API routes for the FRITZ!Box exporter.
 *
 * - /metrics    - Prometheus scrape endpoint
 * - /api/health - Health check with polling loop states
 */
import { Hono } from "hono";
import type { Registry } from "prom-client";

import { createLogger } from "../logger.js";
import type { SchedulerState } from "../scheduler/index.js";

const log = createLogger("api");

export const METRICS_PATH = "/metrics";

export type RouteDependencies = Readonly<{
  registry: Registry;
  getLoopStates: () => SchedulerState;
}>;

export function createRoutes(deps: RouteDependencies): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Metrics
  // ===========================================================================

  /**
   * Current value of every gauge in the text exposition format.
   * Values of a failed poll stay as they were.
   */
  routes.get(METRICS_PATH, async (c) => {
    const body = await deps.registry.metrics();

    c.header("Content-Type", deps.registry.contentType);
    return c.body(body);
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      loops: deps.getLoopStates(),
    });
  });

  return routes;
}
