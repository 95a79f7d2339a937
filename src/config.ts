/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * The exporter refuses to start on invalid config and reports every issue at once.
 *
 * FRITZ!Box exporter configuration covering:
 * - Metrics HTTP server
 * - FRITZ!Box connection and credentials
 * - Polling intervals for device and network metrics
 * - Shutdown budgets
 */
import { existsSync } from "node:fs";
import { config as loadDotenv } from "dotenv";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

// =============================================================================
// Durations
// =============================================================================

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: SECOND_MS,
  m: MINUTE_MS,
  h: HOUR_MS,
};

/**
 * Parse a duration such as "5m", "1m30s", "100s" or "1500ms" into milliseconds.
 * A bare number is taken as milliseconds.
 *
 * @returns Milliseconds, or null if the text is not a duration
 *
 * @example
 * parseDuration("1m30s") // 90000
 * parseDuration("250")   // 250
 */
export function parseDuration(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
  let total = 0;
  let consumed = 0;

  for (const match of trimmed.matchAll(pattern)) {
    if (match.index !== consumed) return null;
    const [whole, amount, unit] = match;
    const factor = unit === undefined ? undefined : DURATION_UNITS_MS[unit];
    if (amount === undefined || factor === undefined) return null;
    total += Number(amount) * factor;
    consumed += whole.length;
  }

  return consumed === trimmed.length ? total : null;
}

/**
 * Format milliseconds the way parseDuration reads them back.
 */
export function formatDuration(ms: number): string {
  if (ms > 0 && ms % HOUR_MS === 0) return `${ms / HOUR_MS}h`;
  if (ms > 0 && ms % MINUTE_MS === 0) return `${ms / MINUTE_MS}m`;
  if (ms > 0 && ms % SECOND_MS === 0) return `${ms / SECOND_MS}s`;
  return `${ms}ms`;
}

/** Longest delay a Node.js timer can wait (2^31 - 1 ms, about 24.8 days) */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const duration = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((val, ctx) => {
      const ms = parseDuration(val);
      if (ms === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${val}" is not a duration (use e.g. 30s, 5m, 1h)`,
        });
        return z.NEVER;
      }
      return ms;
    })
    .pipe(
      z
        .number()
        .positive("interval cannot be zero")
        .max(MAX_TIMER_DELAY_MS, "interval is too long (at most 24 days)"),
    );

/**
 * Parse a HOST:PORT listen address.
 */
const listenAddress = z
  .string()
  .default("0.0.0.0:3000")
  .transform((val, ctx) => {
    const match = /^(.*):(\d{1,5})$/.exec(val.trim());
    const host = match?.[1];
    const port = Number(match?.[2]);
    if (!match || host === undefined || host === "" || port > 65535) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${val}" is not a HOST:PORT address (e.g. localhost:3000)`,
      });
      return z.NEVER;
    }
    return { host: host.replace(/^\[(.*)\]$/, "$1"), port };
  });

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  LISTEN_ADDR: listenAddress.describe("Address of the /metrics HTTP server"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("fritz-metrics").describe("Application name"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info").describe("Pino log level"),

  // ==========================================================================
  // FRITZ!Box Connection
  // ==========================================================================
  FRITZBOX_BASE_URL: z
    .string()
    .url()
    .default("http://fritz.box")
    .describe("Base URL of the FRITZ!Box web interface"),
  FRITZBOX_USERNAME: z
    .string({ required_error: "FRITZBOX_USERNAME is required" })
    .min(1, "FRITZBOX_USERNAME is required")
    .describe("FRITZ!Box user name"),
  FRITZBOX_PASSWORD: z
    .string({ required_error: "FRITZBOX_PASSWORD is required" })
    .min(1, "FRITZBOX_PASSWORD is required")
    .describe("FRITZ!Box password"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("HTTP timeout for a single FRITZ!Box request (ms)"),

  // ==========================================================================
  // Polling
  // ==========================================================================
  DEVICE_MONITORING_INTERVAL: duration("5m").describe(
    "How often smart-home device metrics are fetched",
  ),
  // The FRITZ!Box reports the last 100 seconds in 20 buckets of 5 seconds
  NETWORK_MONITORING_INTERVAL: duration("100s").describe(
    "How often network traffic metrics are fetched",
  ),

  // ==========================================================================
  // Shutdown
  // ==========================================================================
  SHUTDOWN_GRACE_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Time the HTTP server gets to close gracefully (ms)"),
  LOGOUT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("Time the session logout may take on shutdown (ms)"),
});

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export type ConfigError =
  | {
      readonly type: "INVALID_CONFIG";
      readonly message: string;
      readonly issues: ReadonlyArray<string>;
    }
  | {
      readonly type: "ENV_FILE_UNREADABLE";
      readonly message: string;
      readonly path: string;
      readonly cause?: Error;
    };

/**
 * Format a ConfigError for the console, one issue per line.
 */
export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "INVALID_CONFIG":
      return [error.message, ...error.issues.map((issue) => `  - ${issue}`)].join("\n");
    case "ENV_FILE_UNREADABLE":
      return `Cannot read ${error.path}: ${error.message}`;
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate an environment against the config schema.
 * All issues are collected; nothing fails on the first problem.
 */
export function parseConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<Config, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path.join(".");
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    return err({ type: "INVALID_CONFIG", message: "Invalid configuration", issues });
  }

  return ok(parsed.data);
}

/**
 * Load the env file (if present) into process.env and parse the result.
 * Values already present in the environment take precedence.
 */
export function loadConfig(envFile: string): Result<Config, ConfigError> {
  if (existsSync(envFile)) {
    const loaded = loadDotenv({ path: envFile });
    if (loaded.error) {
      return err({
        type: "ENV_FILE_UNREADABLE",
        message: loaded.error.message,
        path: envFile,
        cause: loaded.error,
      });
    }
  }

  return parseConfig(process.env);
}

// =============================================================================
// Logger Settings
// =============================================================================

const LoggerSettingsSchema = z.object({
  NODE_ENV: z.string().catch("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
});

/**
 * Logger settings are read straight from the environment and never fail,
 * so loggers can exist before (or without) a valid config.
 *
 * Modules create their loggers on import, before the env file is loaded:
 * NODE_ENV must come from the process environment to select JSON output.
 * LOG_LEVEL from the env file is applied later through `setLogLevel`.
 */
export function getLoggerSettings(): Readonly<{ pretty: boolean; level: LogLevel }> {
  const settings = LoggerSettingsSchema.parse(process.env);
  return {
    pretty: settings.NODE_ENV === "development",
    level: settings.LOG_LEVEL,
  };
}
