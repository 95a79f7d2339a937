/**
 * FRITZ!Box Module - Schemas and Types
 *
 * Wire shapes of the three endpoints we consume (login, smart-home device
 * list, traffic monitor) and the typed records they decode into.
 * Schemas are the source of truth - wire types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Endpoints
// =============================================================================

export const LOGIN_PATH = "/login_sid.lua";
export const HOME_AUTOMATION_PATH = "/webservices/homeautoswitch.lua";
export const TRAFFIC_MONITOR_PATH = "/internet/inetstat_monitor.lua";

/**
 * Session id the FRITZ!Box hands out to mean "no session".
 */
export const ZERO_SESSION_ID = "0000000000000000";

// =============================================================================
// Session
// =============================================================================

/**
 * Parsed XML text node. Empty and absent elements both read as "".
 */
const text = z.string().default("");

const RightsSchema = z.union([
  z.literal(""),
  z.object({
    Name: z.array(z.string()).default([]),
    Access: z.array(z.string()).default([]),
  }),
]);

/**
 * <SessionInfo> document returned by login_sid.lua.
 */
export const SessionInfoSchema = z.object({
  SessionInfo: z.object({
    SID: text,
    Challenge: text,
    BlockTime: text,
    Rights: RightsSchema.optional(),
  }),
});

export type SessionInfoDocument = z.infer<typeof SessionInfoSchema>;

/**
 * Current authentication state. Replaced as a whole on every handshake step.
 */
export type Session = Readonly<{
  challenge: string;
  /** ZERO_SESSION_ID (or "") means there is no active session */
  sessionId: string;
  blockTimeMs: number;
  permissions: ReadonlySet<string>;
}>;

export const EMPTY_SESSION: Session = {
  challenge: "",
  sessionId: "",
  blockTimeMs: 0,
  permissions: new Set(),
};

// =============================================================================
// Devices
// =============================================================================

/**
 * Device capabilities, by bit position in the functionbitmask attribute.
 */
export const Capability = {
  HanFunCompatibility: 0,
  AlertTrigger: 4,
  HeatControl: 6,
  PowerSensor: 7,
  TemperatureSensor: 8,
  StateSwitch: 9,
  DectRepeater: 10,
  Microphone: 11,
  HanFunUnit: 13,
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

const SwitchXmlSchema = z.object({
  state: text,
  mode: text,
  lock: text,
  devicelock: text,
});

const PowerMeterXmlSchema = z.object({
  power: text,
  energy: text,
  voltage: text,
});

const TemperatureXmlSchema = z.object({
  celsius: text,
  offset: text,
});

/**
 * Child elements that carry no content decode to "" rather than an object.
 */
const optionalElement = <T extends z.ZodTypeAny>(schema: T) =>
  z.union([schema, z.literal("")]).optional();

export const DeviceXmlSchema = z.object({
  "@_identifier": text,
  "@_id": text,
  "@_functionbitmask": text,
  "@_fwversion": text,
  "@_manufacturer": text,
  "@_productname": text,
  present: text,
  name: text,
  switch: optionalElement(SwitchXmlSchema),
  powermeter: optionalElement(PowerMeterXmlSchema),
  temperature: optionalElement(TemperatureXmlSchema),
});

export type DeviceXml = z.infer<typeof DeviceXmlSchema>;

/**
 * <devicelist> document returned by getdevicelistinfos.
 */
export const DeviceListSchema = z.object({
  devicelist: z.union([
    z.literal(""),
    z.object({
      device: z.array(DeviceXmlSchema).default([]),
    }),
  ]),
});

export type DeviceListDocument = z.infer<typeof DeviceListSchema>;

export type SwitchInfo = Readonly<{
  /** "1" on, "0" off, "" unknown */
  state: string;
  mode: string;
  lock: string;
  deviceLock: string;
}>;

/**
 * Raw power meter readings, as sent by the device.
 */
export type PowerInfo = Readonly<{
  /** milliwatts */
  power: string;
  /** watt hours since initial setup */
  energy: string;
  /** millivolts */
  voltage: string;
}>;

export type TemperatureInfo = Readonly<{
  /** tenths of a degree Celsius */
  celsius: string;
  offset: string;
}>;

/**
 * One smart-home device, as seen in a single poll.
 */
export type Device = Readonly<{
  identifier: string;
  internalId: string;
  name: string;
  present: boolean;
  firmwareVersion: string;
  manufacturer: string;
  productName: string;
  capabilities: ReadonlySet<Capability>;
  switch: SwitchInfo | null;
  power: PowerInfo | null;
  temperature: TemperatureInfo | null;
}>;

// =============================================================================
// Traffic Monitor
// =============================================================================

/**
 * 20 values covering the last 100 seconds in buckets of 5 seconds, newest first.
 */
const series = z.array(z.number()).min(1, "series is empty");

export const TrafficRecordSchema = z.object({
  ds_bps_curr: series,
  ds_mc_bps_curr: series,
  ds_guest_bps_curr: series,
  us_realtime_bps_curr: series,
  us_important_bps_curr: series,
  us_default_bps_curr: series,
  us_background_bps_curr: series,
  guest_us_bps: series,
});

export const TrafficResponseSchema = z.array(TrafficRecordSchema);

export type TrafficRecord = z.infer<typeof TrafficRecordSchema>;

/**
 * Bytes per second for each stream, newest bucket first.
 */
export type TrafficSnapshot = Readonly<{
  downstreamInternet: ReadonlyArray<number>;
  downstreamMedia: ReadonlyArray<number>;
  downstreamGuest: ReadonlyArray<number>;
  upstreamRealtime: ReadonlyArray<number>;
  upstreamHighPriority: ReadonlyArray<number>;
  upstreamDefaultPriority: ReadonlyArray<number>;
  upstreamLowPriority: ReadonlyArray<number>;
  upstreamGuest: ReadonlyArray<number>;
}>;

export type TrafficStream = keyof TrafficSnapshot;
