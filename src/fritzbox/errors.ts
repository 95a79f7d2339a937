/**
 * FRITZ!Box Module - Error Types
 *
 * Typed error unions for router operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to the FRITZ!Box.
 */
export type FritzBoxError =
  | {
      /** Bad credentials or rejected handshake. Never retried automatically. */
      readonly type: "AUTH_FAILED";
      readonly message: string;
      readonly blockTimeMs?: number;
    }
  | {
      /** Network failure, timeout or a non-200 status. */
      readonly type: "TRANSPORT_FAILED";
      readonly message: string;
      readonly status?: number;
      readonly cause?: Error;
    }
  | {
      /** Malformed or empty payload. */
      readonly type: "DECODE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_URL";
      readonly message: string;
    };

/**
 * Create an AUTH_FAILED error.
 */
export function authFailed(message: string, blockTimeMs?: number): FritzBoxError {
  if (blockTimeMs !== undefined && blockTimeMs > 0) {
    return { type: "AUTH_FAILED", message, blockTimeMs };
  }
  return { type: "AUTH_FAILED", message };
}

/**
 * Create a TRANSPORT_FAILED error for a non-200 response.
 */
export function badStatus(status: number, statusText: string): FritzBoxError {
  return {
    type: "TRANSPORT_FAILED",
    message: `bad HTTP status code: ${status} ${statusText}`.trim(),
    status,
  };
}

/**
 * Create a TRANSPORT_FAILED error for a request that never produced a response.
 */
export function transportFailed(message: string, cause?: Error): FritzBoxError {
  if (cause) {
    return { type: "TRANSPORT_FAILED", message, cause };
  }
  return { type: "TRANSPORT_FAILED", message };
}

/**
 * Create a DECODE_FAILED error.
 */
export function decodeFailed(message: string, cause?: Error): FritzBoxError {
  if (cause) {
    return { type: "DECODE_FAILED", message, cause };
  }
  return { type: "DECODE_FAILED", message };
}

/**
 * Create an INVALID_URL error.
 */
export function invalidUrl(message: string): FritzBoxError {
  return { type: "INVALID_URL", message };
}

/**
 * Prefix the message of an error with the operation it happened in,
 * keeping its type and details.
 */
export function withContext(context: string, error: FritzBoxError): FritzBoxError {
  return { ...error, message: `${context}: ${error.message}` };
}

/**
 * Format a FritzBoxError for logging.
 */
export function formatFritzBoxError(error: FritzBoxError): string {
  switch (error.type) {
    case "AUTH_FAILED":
      return error.blockTimeMs
        ? `Auth failed: ${error.message} (login blocked for ${error.blockTimeMs / 1000}s)`
        : `Auth failed: ${error.message}`;
    case "TRANSPORT_FAILED":
      return `Transport error: ${error.message}`;
    case "DECODE_FAILED":
      return `Decode error: ${error.message}`;
    case "INVALID_URL":
      return `Invalid URL: ${error.message}`;
  }
}
