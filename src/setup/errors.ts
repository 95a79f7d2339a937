/**
 * Setup Module - Error Types
 */

export type SetupError =
  | {
      /** The operator declined or interrupted the wizard. */
      readonly type: "ABORTED";
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly message: string;
      readonly path: string;
      readonly cause?: Error;
    };

export function aborted(message: string): SetupError {
  return { type: "ABORTED", message };
}

export function writeFailed(path: string, message: string, cause?: Error): SetupError {
  if (cause) {
    return { type: "WRITE_FAILED", message, path, cause };
  }
  return { type: "WRITE_FAILED", message, path };
}

export function formatSetupError(error: SetupError): string {
  switch (error.type) {
    case "ABORTED":
      return `Setup aborted: ${error.message}`;
    case "WRITE_FAILED":
      return `Failed to write ${error.path}: ${error.message}`;
  }
}
