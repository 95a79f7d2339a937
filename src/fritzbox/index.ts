/**
 * FRITZ!Box Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  Device,
  PowerInfo,
  Session,
  SwitchInfo,
  TemperatureInfo,
  TrafficSnapshot,
  TrafficStream,
} from "./schema.js";
export type { FritzBoxError } from "./errors.js";
export type { FritzBoxClient, FritzBoxClientOptions } from "./service.js";
export type { SessionManager } from "./session.js";
export type { Transport } from "./transport.js";

export { Capability, ZERO_SESSION_ID } from "./schema.js";

// Error utilities
export { formatFritzBoxError } from "./errors.js";

// Service functions (side effects)
export { createClient, createFritzBoxClient } from "./service.js";
export { createSessionManager } from "./session.js";
export { createTransport } from "./transport.js";

// Pure transformations
export {
  canMeasurePower,
  canMeasureTemperature,
  decodeDeviceList,
  decodeTrafficSnapshot,
  getCelsius,
  getEnergy,
  getPower,
  getVoltage,
  hasCapabilities,
  isPoweredOn,
  isSwitch,
  parseCapabilities,
  solveChallenge,
} from "./transform.js";
