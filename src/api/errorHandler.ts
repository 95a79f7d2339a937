/**
 * Global error boundary for the metrics server.
 */
import type { ErrorHandler } from "hono";

import { createLogger } from "../logger.js";
import { METRICS_PATH } from "./routes.js";

const log = createLogger("api");

/**
 * Log the error with request context and answer with a 500.
 *
 * Scrapes get a plain-text body, everything else JSON.
 * The message is hidden in production.
 */
export const errorHandler: ErrorHandler = (error, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const isScrape = c.req.path === METRICS_PATH;

  log.error(
    {
      operation: isScrape ? "scrape" : "unhandledError",
      requestId,
      error: error.message,
      stack: error.stack,
      path: c.req.path,
      method: c.req.method,
    },
    isScrape ? "Failed to render metrics" : "Unhandled error",
  );

  const message =
    process.env.NODE_ENV === "production"
      ? "Internal server error"
      : error.message;

  if (isScrape) {
    return c.text(`${message}\n`, 500);
  }
  return c.json({ error: message, requestId }, 500);
};
