/**
 * Setup Module - Types and Constants
 */
import type { ListenAddress } from "../lifecycle/index.js";

export const DEFAULT_ENV_FILE = ".env";

/** Shortest device interval the wizard accepts */
export const MIN_DEVICE_INTERVAL_MS = 10_000;

/**
 * Everything the wizard asks for.
 */
export type SetupAnswers = Readonly<{
  listenAddress: ListenAddress;
  deviceIntervalMs: number;
  baseUrl: string;
  username: string;
  password: string;
}>;

/**
 * Values offered as defaults, as written in an env file.
 */
export type SetupDefaults = Readonly<{
  LISTEN_ADDR: string;
  DEVICE_MONITORING_INTERVAL: string;
  FRITZBOX_BASE_URL: string;
  FRITZBOX_USERNAME: string;
}>;
