/**
 * Metrics Module - Public API
 */

// Types
export type { DeviceObservations, NetworkObservations, NetworkStream } from "./schema.js";
export type { MetricsRecorder } from "./service.js";

export { NETWORK_STREAMS } from "./schema.js";

// Service functions
export { collectDeviceMetrics, collectNetworkMetrics, createMetrics } from "./service.js";

// Pure transformations
export {
  collectDeviceObservations,
  collectNetworkObservations,
  observationLogFields,
} from "./transform.js";
