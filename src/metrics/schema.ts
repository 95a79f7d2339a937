/**
 * Metrics Module - Schemas and Types
 *
 * Observations are the named numeric values one poll produces.
 * Optional fields are left out when the device lacks the capability.
 */

/**
 * Observations for one smart-home device.
 */
export type DeviceObservations = Readonly<{
  deviceName: string;
  /** 1 if the device is connected to the router, 0 otherwise */
  isConnected: number;
  temperatureCelsius?: number;
  voltage?: number;
  power?: number;
  energy?: number;
  /** 1 if the switch is on, 0 otherwise */
  isPowered?: number;
}>;

export const NETWORK_STREAMS = [
  "downstreamInternet",
  "downstreamMedia",
  "downstreamGuest",
  "upstreamRealtime",
  "upstreamHighPriority",
  "upstreamDefaultPriority",
  "upstreamLowPriority",
  "upstreamGuest",
] as const;

export type NetworkStream = (typeof NETWORK_STREAMS)[number];

/**
 * Bits per second of the newest bucket of every traffic stream.
 */
export type NetworkObservations = Readonly<Record<NetworkStream, number>>;

export const DEVICE_LABEL = "device_name";

export const HOME_AUTOMATION_PREFIX = "fritzbox_home_automation";
export const NETWORK_PREFIX = "fritzbox_network";

/**
 * Metric name suffix and help text of every network gauge.
 */
export const NETWORK_GAUGES: Readonly<
  Record<NetworkStream, Readonly<{ name: string; help: string }>>
> = {
  downstreamInternet: {
    name: "downstream_inet_bps",
    help: "Internet downstream in bits per second.",
  },
  downstreamMedia: {
    name: "downstream_media_bps",
    help: "Media downstream in bits per second.",
  },
  downstreamGuest: {
    name: "downstream_guest_bps",
    help: "Guest network downstream in bits per second.",
  },
  upstreamRealtime: {
    name: "upstream_realtime_bps",
    help: "Realtime priority upstream in bits per second.",
  },
  upstreamHighPriority: {
    name: "upstream_important_bps",
    help: "High priority upstream in bits per second.",
  },
  upstreamDefaultPriority: {
    name: "upstream_default_bps",
    help: "Default priority upstream in bits per second.",
  },
  upstreamLowPriority: {
    name: "upstream_background_bps",
    help: "Low priority upstream in bits per second.",
  },
  upstreamGuest: {
    name: "upstream_guest_bps",
    help: "Guest network upstream in bits per second.",
  },
};
