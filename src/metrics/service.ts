/**
 * Metrics Module - Service Layer
 *
 * Owns the Prometheus gauges and runs one collection cycle per metric family.
 * A cycle either updates every gauge it covers or, on failure, none of them.
 */
import { type Result, err, ok } from "neverthrow";
import { Gauge, Registry } from "prom-client";

import type { FritzBoxClient, FritzBoxError } from "../fritzbox/index.js";
import { createLogger } from "../logger.js";
import {
  DEVICE_LABEL,
  type DeviceObservations,
  HOME_AUTOMATION_PREFIX,
  NETWORK_GAUGES,
  NETWORK_PREFIX,
  NETWORK_STREAMS,
  type NetworkObservations,
  type NetworkStream,
} from "./schema.js";
import {
  collectDeviceObservations,
  collectNetworkObservations,
  observationLogFields,
} from "./transform.js";

const log = createLogger("metrics");

export type MetricsRecorder = Readonly<{
  registry: Registry;
  recordDevice(observations: DeviceObservations): void;
  recordNetwork(observations: NetworkObservations): void;
}>;

/**
 * Register every gauge in the given registry.
 * Each gauge is set independently, so scrapes may run while a poll writes.
 */
export function createMetrics(registry: Registry = new Registry()): MetricsRecorder {
  const deviceGauge = (name: string, help: string) =>
    new Gauge({
      name: `${HOME_AUTOMATION_PREFIX}_${name}`,
      help,
      labelNames: [DEVICE_LABEL],
      registers: [registry],
    });

  const isConnected = deviceGauge(
    "device_connected_bool",
    "Either 0 or 1 to indicate if the device is currently connected to the FRITZ!Box.",
  );
  const isPowered = deviceGauge(
    "is_powered_bool",
    "Either 0 or 1 to indicate if the device is powered on or off.",
  );
  const temperature = deviceGauge(
    "temperature_celsius",
    "Temperature measured at the device sensor in degree Celsius.",
  );
  const power = deviceGauge(
    "power_watts",
    "Electric power in Watt, refreshed approx every 2 minutes.",
  );
  const voltage = deviceGauge(
    "voltage_volts",
    "Electric voltage in Volt, refreshed approx every 2 minutes.",
  );
  const energy = deviceGauge(
    "energy_watthours_total",
    "Accumulated power consumption in Watt hours since initial setup.",
  );

  const network = new Map<NetworkStream, Gauge>(
    NETWORK_STREAMS.map((stream): [NetworkStream, Gauge] => [
      stream,
      new Gauge({
        name: `${NETWORK_PREFIX}_${NETWORK_GAUGES[stream].name}`,
        help: NETWORK_GAUGES[stream].help,
        registers: [registry],
      }),
    ]),
  );

  return {
    registry,

    recordDevice(observations) {
      const labels = { [DEVICE_LABEL]: observations.deviceName };

      isConnected.set(labels, observations.isConnected);
      if (observations.temperatureCelsius !== undefined) {
        temperature.set(labels, observations.temperatureCelsius);
      }
      if (observations.voltage !== undefined) {
        voltage.set(labels, observations.voltage);
      }
      if (observations.power !== undefined) {
        power.set(labels, observations.power);
      }
      if (observations.energy !== undefined) {
        energy.set(labels, observations.energy);
      }
      if (observations.isPowered !== undefined) {
        isPowered.set(labels, observations.isPowered);
      }
    },

    recordNetwork(observations) {
      for (const stream of NETWORK_STREAMS) {
        network.get(stream)?.set(observations[stream]);
      }
    },
  };
}

// =============================================================================
// Collection Cycles
// =============================================================================

/**
 * Fetch all devices and publish their observations.
 *
 * @returns Number of devices collected
 */
export async function collectDeviceMetrics(
  client: FritzBoxClient,
  metrics: MetricsRecorder,
  signal?: AbortSignal,
): Promise<Result<number, FritzBoxError>> {
  const devices = await client.getDevices(signal);
  if (devices.isErr()) {
    return err(devices.error);
  }

  for (const device of devices.value) {
    const observations = collectDeviceObservations(device);
    metrics.recordDevice(observations);
    log.debug(observationLogFields(observations), "Collected device metrics");
  }

  return ok(devices.value.length);
}

/**
 * Fetch the traffic snapshot and publish the network observations.
 */
export async function collectNetworkMetrics(
  client: FritzBoxClient,
  metrics: MetricsRecorder,
  signal?: AbortSignal,
): Promise<Result<NetworkObservations, FritzBoxError>> {
  const snapshot = await client.getTrafficSnapshot(signal);
  if (snapshot.isErr()) {
    return err(snapshot.error);
  }

  const observations = collectNetworkObservations(snapshot.value);
  metrics.recordNetwork(observations);
  log.debug(observations, "Collected network metrics");

  return ok(observations);
}
