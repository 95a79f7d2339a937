/**
 * FRITZ!Box Module - Pure Transformations
 *
 * Challenge solving, URL building and payload decoding.
 * No side effects, no I/O - just data in, data out.
 */
import { createHash } from "node:crypto";
import { posix } from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { type Result, err, ok } from "neverthrow";

import { type FritzBoxError, decodeFailed } from "./errors.js";
import {
  Capability,
  type Device,
  type DeviceXml,
  DeviceListSchema,
  type PowerInfo,
  type Session,
  SessionInfoSchema,
  type TemperatureInfo,
  type TrafficSnapshot,
  TrafficResponseSchema,
  ZERO_SESSION_ID,
} from "./schema.js";

// =============================================================================
// Authentication
// =============================================================================

/**
 * Whether a session id stands for an authenticated session.
 */
export function isValidSessionId(sessionId: string): boolean {
  return sessionId !== "" && sessionId !== ZERO_SESSION_ID;
}

/**
 * Hex MD5 of the UTF-16LE encoding of a string.
 * The FRITZ!Box hashes UTF-16LE; hashing UTF-8 yields a response it rejects.
 */
export function md5Utf16le(value: string): string {
  return createHash("md5").update(Buffer.from(value, "utf16le")).digest("hex");
}

/**
 * Solve a login challenge.
 *
 * @example
 * solveChallenge("1234567z", "äbc")
 * // "1234567z-9e224a41eeefa284df7bb0f26c2913e2"
 */
export function solveChallenge(challenge: string, password: string): string {
  return `${challenge}-${md5Utf16le(`${challenge}-${password}`)}`;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Query parameters as key/value pairs. Order does not matter; keys are sorted.
 */
export type QueryParams = ReadonlyArray<readonly [string, string]>;

/**
 * Join the endpoint path onto the base URL and attach the sorted query.
 * The base URL is never modified.
 *
 * @example
 * buildRequestUrl(new URL("http://fritz.box/"), "/login_sid.lua", [["sid", ""]])
 * // "http://fritz.box/login_sid.lua?sid="
 */
export function buildRequestUrl(
  baseUrl: URL,
  path: string,
  params: QueryParams,
): string {
  const url = new URL(baseUrl.toString());
  url.pathname = posix.join(baseUrl.pathname, path);

  const search = new URLSearchParams();
  for (const [key, value] of params) {
    search.append(key, value);
  }
  search.sort();
  url.search = search.toString();

  return url.toString();
}

// =============================================================================
// XML Decoding
// =============================================================================

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jpath) =>
    jpath === "devicelist.device" ||
    jpath === "SessionInfo.Rights.Name" ||
    jpath === "SessionInfo.Rights.Access",
});

function parseXml(body: string): Result<unknown, FritzBoxError> {
  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return err(decodeFailed(`malformed XML (line ${line}): ${msg}`));
  }

  try {
    return ok(xmlParser.parse(body));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(decodeFailed(`failed to parse XML: ${cause.message}`, cause));
  }
}

/**
 * Decode a <SessionInfo> document.
 */
export function decodeSession(body: string): Result<Session, FritzBoxError> {
  return parseXml(body).andThen((document) => {
    const parsed = SessionInfoSchema.safeParse(document);
    if (!parsed.success) {
      return err(decodeFailed("response is not a SessionInfo document"));
    }

    const info = parsed.data.SessionInfo;
    const rights = info.Rights === undefined || info.Rights === "" ? [] : info.Rights.Name;

    return ok({
      challenge: info.Challenge,
      sessionId: info.SID,
      blockTimeMs: parseNumber(info.BlockTime) * 1000,
      permissions: new Set(rights),
    });
  });
}

/**
 * Decode a <devicelist> document.
 */
export function decodeDeviceList(
  body: string,
): Result<ReadonlyArray<Device>, FritzBoxError> {
  return parseXml(body).andThen((document) => {
    const parsed = DeviceListSchema.safeParse(document);
    if (!parsed.success) {
      return err(decodeFailed("response is not a devicelist document"));
    }

    const list = parsed.data.devicelist;
    const devices = list === "" ? [] : list.device.map(toDevice);
    return ok(devices);
  });
}

function toDevice(xml: DeviceXml): Device {
  return {
    identifier: xml["@_identifier"],
    internalId: xml["@_id"],
    name: xml.name,
    present: xml.present === "1",
    firmwareVersion: xml["@_fwversion"],
    manufacturer: xml["@_manufacturer"],
    productName: xml["@_productname"],
    capabilities: parseCapabilities(xml["@_functionbitmask"]),
    switch: xml.switch
      ? {
          state: xml.switch.state,
          mode: xml.switch.mode,
          lock: xml.switch.lock,
          deviceLock: xml.switch.devicelock,
        }
      : null,
    power: xml.powermeter
      ? {
          power: xml.powermeter.power,
          energy: xml.powermeter.energy,
          voltage: xml.powermeter.voltage,
        }
      : null,
    temperature: xml.temperature
      ? { celsius: xml.temperature.celsius, offset: xml.temperature.offset }
      : null,
  };
}

// =============================================================================
// Capabilities
// =============================================================================

const ALL_CAPABILITIES: ReadonlyArray<Capability> = Object.values(Capability);

/**
 * Read the functionbitmask attribute into a set of named capabilities.
 * Anything that is not a base-10 integer means "no capabilities".
 *
 * @example
 * parseCapabilities("896") // Set { PowerSensor, TemperatureSensor, StateSwitch }
 */
export function parseCapabilities(bitmask: string): ReadonlySet<Capability> {
  const trimmed = bitmask.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return new Set();
  }

  const bits = BigInt.asUintN(64, BigInt(trimmed));
  return new Set(
    ALL_CAPABILITIES.filter((capability) => (bits & (1n << BigInt(capability))) !== 0n),
  );
}

/**
 * True only if the device supports every given capability.
 */
export function hasCapabilities(device: Device, ...capabilities: Capability[]): boolean {
  return capabilities.every((capability) => device.capabilities.has(capability));
}

export function canMeasurePower(device: Device): boolean {
  return hasCapabilities(device, Capability.PowerSensor);
}

export function canMeasureTemperature(device: Device): boolean {
  return hasCapabilities(device, Capability.TemperatureSensor);
}

export function isSwitch(device: Device): boolean {
  return hasCapabilities(device, Capability.StateSwitch);
}

// =============================================================================
// Readings
// =============================================================================

/**
 * Parse a decimal reading, defaulting to 0 for anything unparsable.
 */
export function parseNumber(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === "") return 0;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : 0;
}

/** Volts (wire: millivolts). */
export function getVoltage(power: PowerInfo): number {
  return parseNumber(power.voltage) / 1000;
}

/** Watts (wire: milliwatts). */
export function getPower(power: PowerInfo): number {
  return parseNumber(power.power) / 1000;
}

/** Watt hours, as sent. */
export function getEnergy(power: PowerInfo): number {
  return parseNumber(power.energy);
}

/** Degrees Celsius (wire: tenths of a degree). */
export function getCelsius(temperature: TemperatureInfo): number {
  return parseNumber(temperature.celsius) / 10;
}

export function isPoweredOn(device: Device): boolean {
  return device.switch?.state === "1";
}

// =============================================================================
// JSON Decoding
// =============================================================================

/**
 * Decode the traffic monitor response. The router answers with an array;
 * only the first element is used.
 */
export function decodeTrafficSnapshot(
  body: string,
): Result<TrafficSnapshot, FritzBoxError> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(decodeFailed(`failed to decode response as JSON: ${cause.message}`, cause));
  }

  const parsed = TrafficResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") ?? "";
    const at = where ? ` at ${where}` : "";
    return err(
      decodeFailed(
        `unexpected traffic monitor response${at}: ${issue?.message ?? "invalid"}`,
      ),
    );
  }

  const record = parsed.data[0];
  if (record === undefined) {
    return err(decodeFailed("FRITZ!Box returned no monitoring data"));
  }

  return ok({
    downstreamInternet: record.ds_bps_curr,
    downstreamMedia: record.ds_mc_bps_curr,
    downstreamGuest: record.ds_guest_bps_curr,
    upstreamRealtime: record.us_realtime_bps_curr,
    upstreamHighPriority: record.us_important_bps_curr,
    upstreamDefaultPriority: record.us_default_bps_curr,
    upstreamLowPriority: record.us_background_bps_curr,
    upstreamGuest: record.guest_us_bps,
  });
}
