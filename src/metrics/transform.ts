/**
 * Metrics Module - Pure Transformations
 *
 * Collectors: map decoded router records onto observations.
 * Capability checks never fail; they only leave optional observations out.
 */
import {
  type Device,
  type PowerInfo,
  type TemperatureInfo,
  type TrafficSnapshot,
  type TrafficStream,
  canMeasurePower,
  canMeasureTemperature,
  getCelsius,
  getEnergy,
  getPower,
  getVoltage,
  isPoweredOn,
  isSwitch,
} from "../fritzbox/index.js";
import type { DeviceObservations, NetworkObservations } from "./schema.js";

const BITS_PER_BYTE = 8;

const EMPTY_POWER: PowerInfo = { power: "", energy: "", voltage: "" };
const EMPTY_TEMPERATURE: TemperatureInfo = { celsius: "", offset: "" };

function asGaugeBool(value: boolean): number {
  return value ? 1 : 0;
}

/**
 * Collect the observations one device contributes.
 *
 * @example
 * collectDeviceObservations(plug)
 * // { deviceName: "Plug", isConnected: 1, voltage: 230.5, power: 12.34,
 * //   energy: 707, isPowered: 1 }
 */
export function collectDeviceObservations(device: Device): DeviceObservations {
  // Missing child elements read like empty ones: every value becomes 0
  const readings = device.power ?? EMPTY_POWER;
  const temperature = device.temperature ?? EMPTY_TEMPERATURE;

  return {
    deviceName: device.name,
    isConnected: asGaugeBool(device.present),
    ...(canMeasureTemperature(device) ? { temperatureCelsius: getCelsius(temperature) } : {}),
    ...(canMeasurePower(device)
      ? {
          voltage: getVoltage(readings),
          power: getPower(readings),
          energy: getEnergy(readings),
        }
      : {}),
    ...(isSwitch(device) ? { isPowered: asGaugeBool(isPoweredOn(device)) } : {}),
  };
}

/**
 * Newest bucket of a stream, converted from bytes to bits per second.
 * The older 19 buckets are not used.
 */
function latestBitsPerSecond(snapshot: TrafficSnapshot, stream: TrafficStream): number {
  return (snapshot[stream][0] ?? 0) * BITS_PER_BYTE;
}

/**
 * Collect the network observations of a traffic snapshot.
 */
export function collectNetworkObservations(snapshot: TrafficSnapshot): NetworkObservations {
  return {
    downstreamInternet: latestBitsPerSecond(snapshot, "downstreamInternet"),
    downstreamMedia: latestBitsPerSecond(snapshot, "downstreamMedia"),
    downstreamGuest: latestBitsPerSecond(snapshot, "downstreamGuest"),
    upstreamRealtime: latestBitsPerSecond(snapshot, "upstreamRealtime"),
    upstreamHighPriority: latestBitsPerSecond(snapshot, "upstreamHighPriority"),
    upstreamDefaultPriority: latestBitsPerSecond(snapshot, "upstreamDefaultPriority"),
    upstreamLowPriority: latestBitsPerSecond(snapshot, "upstreamLowPriority"),
    upstreamGuest: latestBitsPerSecond(snapshot, "upstreamGuest"),
  };
}

/**
 * Flatten observations into sorted log fields.
 *
 * @example
 * observationLogFields({ deviceName: "Plug", isConnected: 1, power: 5 })
 * // { device_name: "Plug", is_connected: 1, power: 5 }
 */
export function observationLogFields(
  observations: DeviceObservations,
): Record<string, string | number> {
  const { deviceName, ...values } = observations;
  const entries = Object.entries(values)
    .map(([name, value]) => [toSnakeCase(name), value] as const)
    .sort(([a], [b]) => a.localeCompare(b));

  const fields: Record<string, string | number> = { device_name: deviceName };
  for (const [name, value] of entries) {
    if (value !== undefined) {
      fields[name] = value;
    }
  }
  return fields;
}

function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
