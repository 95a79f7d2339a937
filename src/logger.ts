/**
 * Module-scoped color-coded loggers for the FRITZ!Box exporter.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import pino from "pino";
import { type LogLevel, getLoggerSettings } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  api: "\x1b[34m", // blue
  lifecycle: "\x1b[33m", // yellow
  scheduler: "\x1b[93m", // bright yellow

  // Router modules
  fritzbox: "\x1b[36m", // cyan
  session: "\x1b[35m", // magenta
  metrics: "\x1b[32m", // green
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

const loggers: pino.Logger[] = [];

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('fritzbox');
 * log.info({ baseUrl }, 'Requesting device list');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];
  const settings = getLoggerSettings();

  const logger = settings.pretty
    ? pino({
        name: module,
        level: settings.level,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            messageFormat: `${color}[{name}]${RESET} {msg}`,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss",
          },
        },
      })
    : pino({
        name: module,
        level: settings.level,
      });

  loggers.push(logger);
  return logger;
}

/**
 * Change the level of every logger created so far.
 * Used by the --debug flag, which is parsed after modules have created their loggers.
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.debug(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Mask a secret for logging, keeping only its first and last character.
 *
 * @example
 * maskSecret("9d1c0a7ff2a6b3e1") // "9**************1"
 */
export function maskSecret(value: string): string {
  if (value.length < 4) return "*".repeat(value.length);
  return `${value.slice(0, 1)}${"*".repeat(value.length - 2)}${value.slice(-1)}`;
}
