/**
 * Setup Module - Pure Transformations
 *
 * Answer validation and env-file rendering. Validators return the parsed
 * value, or the message shown before the question is asked again.
 */
import { join } from "node:path";

import { type Result, err, ok } from "neverthrow";

import {
  ConfigSchema,
  MAX_TIMER_DELAY_MS,
  formatDuration,
  parseDuration,
} from "../config.js";
import type { ListenAddress } from "../lifecycle/index.js";
import { MIN_DEVICE_INTERVAL_MS, type SetupAnswers, type SetupDefaults } from "./schema.js";

export function expandHome(path: string, home: string): string {
  return path.startsWith("~/") ? join(home, path.slice(2)) : path;
}

export function isConfirmation(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}

// =============================================================================
// Answer Validation
// =============================================================================

export function validateListenAddress(text: string): Result<ListenAddress, string> {
  const parsed = ConfigSchema.shape.LISTEN_ADDR.safeParse(text);
  if (!parsed.success) {
    return err(
      "This is not a valid address. " +
        "Please use the HOST:PORT notation (e.g. localhost:3000)",
    );
  }
  return ok(parsed.data);
}

/**
 * @example
 * validateInterval("5m")  // ok(300000)
 * validateInterval("5s")  // err("The interval \"5s\" is too short. ...")
 */
export function validateInterval(text: string): Result<number, string> {
  const ms = parseDuration(text);
  if (ms === null) {
    return err(
      'Invalid interval. Please use a duration such as "5m" for five minutes ' +
        'or "30s" for thirty seconds.',
    );
  }
  if (ms < MIN_DEVICE_INTERVAL_MS) {
    return err(
      `The interval "${text.trim()}" is too short. ` +
        "Please choose a duration of at least 10 seconds.",
    );
  }
  if (ms > MAX_TIMER_DELAY_MS) {
    return err(
      `The interval "${text.trim()}" is too long. ` +
        "Please choose a duration of at most 24 days.",
    );
  }
  return ok(ms);
}

export function validateBaseUrl(text: string): Result<string, string> {
  let url: URL;
  try {
    url = new URL(text.trim());
  } catch {
    return err(`"${text}" is not a valid URL`);
  }

  if (url.protocol === "https:") {
    return err("Connecting to the FRITZ!Box via HTTPS is not supported. Please use http instead.");
  }
  if (url.protocol !== "http:") {
    return err(`Unsupported URL scheme "${url.protocol}". Please use http.`);
  }
  return ok(text.trim());
}

export function validateUsername(text: string): Result<string, string> {
  const username = text.trim();
  if (username === "") {
    return err("The username cannot be empty and there is no sensible default");
  }
  return ok(username);
}

// =============================================================================
// Addresses
// =============================================================================

export function formatListenAddress(address: ListenAddress): string {
  const host = address.host.includes(":") ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}

/**
 * URL that reaches a server listening on the address from this machine.
 * Wildcard hosts are reached through loopback.
 */
export function pingUrl(address: ListenAddress): string {
  const host =
    address.host === "0.0.0.0" ? "127.0.0.1" : address.host === "::" ? "::1" : address.host;
  return `http://${formatListenAddress({ host, port: address.port })}/ping`;
}

// =============================================================================
// Env File
// =============================================================================

/**
 * Defaults for the questions, taken from an existing env file where it has them.
 */
export function setupDefaults(existing: Readonly<Record<string, string>>): SetupDefaults {
  return {
    LISTEN_ADDR: existing.LISTEN_ADDR ?? "0.0.0.0:3000",
    DEVICE_MONITORING_INTERVAL: existing.DEVICE_MONITORING_INTERVAL ?? "5m",
    FRITZBOX_BASE_URL: existing.FRITZBOX_BASE_URL ?? "http://fritz.box",
    FRITZBOX_USERNAME: existing.FRITZBOX_USERNAME ?? "",
  };
}

/**
 * The answered keys first, then every other key of the file being replaced.
 */
export function toEnvironment(
  answers: SetupAnswers,
  existing: Readonly<Record<string, string>> = {},
): Record<string, string> {
  const answered: Record<string, string> = {
    LISTEN_ADDR: formatListenAddress(answers.listenAddress),
    DEVICE_MONITORING_INTERVAL: formatDuration(answers.deviceIntervalMs),
    FRITZBOX_BASE_URL: answers.baseUrl,
    FRITZBOX_USERNAME: answers.username,
    FRITZBOX_PASSWORD: answers.password,
  };

  return { ...answered, ...withoutKeys(existing, Object.keys(answered)) };
}

function withoutKeys(
  env: Readonly<Record<string, string>>,
  keys: ReadonlyArray<string>,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter(([key]) => !keys.includes(key)),
  );
}

/**
 * Quote a value so dotenv reads it back unchanged.
 *
 * @returns null if no quoting preserves the value
 */
export function quoteEnvValue(value: string): string | null {
  if (/^[^\s#'"`]*$/.test(value)) {
    return value;
  }
  if (/[\r\n]/.test(value)) {
    return null;
  }
  for (const quote of ["'", "`"]) {
    if (!value.includes(quote)) {
      return `${quote}${value}${quote}`;
    }
  }
  // double quotes expand \n and \r escapes
  if (!value.includes('"') && !/\\[nr]/.test(value)) {
    return `"${value}"`;
  }
  return null;
}

export function renderEnvFile(env: Readonly<Record<string, string>>): Result<string, string> {
  const lines = [
    "# FRITZ!Box exporter configuration, written by `fritz-metrics setup`.",
    "# It is read once at startup: restart the exporter after editing.",
  ];

  for (const [key, value] of Object.entries(env)) {
    const quoted = quoteEnvValue(value);
    if (quoted === null) {
      return err(`${key} contains a combination of quotes that cannot be written to an env file`);
    }
    lines.push(`${key}=${quoted}`);
  }

  return ok(`${lines.join("\n")}\n`);
}
