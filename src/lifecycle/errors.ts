/**
 * Lifecycle Module - Error Types
 */

export type LifecycleError =
  | {
      /** The metrics server could not listen or crashed while serving. */
      readonly type: "SERVER_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      /** The metrics server did not close cleanly within its grace period. */
      readonly type: "SHUTDOWN_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

export function serverFailed(message: string, cause?: Error): LifecycleError {
  if (cause) {
    return { type: "SERVER_FAILED", message, cause };
  }
  return { type: "SERVER_FAILED", message };
}

export function shutdownFailed(message: string, cause?: Error): LifecycleError {
  if (cause) {
    return { type: "SHUTDOWN_FAILED", message, cause };
  }
  return { type: "SHUTDOWN_FAILED", message };
}

/**
 * Format a LifecycleError for logging.
 */
export function formatLifecycleError(error: LifecycleError): string {
  switch (error.type) {
    case "SERVER_FAILED":
      return `Server failed: ${error.message}`;
    case "SHUTDOWN_FAILED":
      return `Shutdown failed: ${error.message}`;
  }
}
