/**
 * Router payloads shared by the FRITZ!Box and metrics tests.
 */

export const VALID_SID = "9d1c0a7ff2a6b3e1";
export const OTHER_SID = "5f8e7d6c5b4a3921";
export const ZERO_SID = "0000000000000000";

export function sessionXml(options: {
  sid: string;
  challenge?: string;
  blockTime?: string;
  rights?: ReadonlyArray<string>;
}): string {
  const rights = (options.rights ?? [])
    .map((name) => `<Name>${name}</Name><Access>2</Access>`)
    .join("");

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    "<SessionInfo>",
    `<SID>${options.sid}</SID>`,
    `<Challenge>${options.challenge ?? "abc123"}</Challenge>`,
    `<BlockTime>${options.blockTime ?? "0"}</BlockTime>`,
    `<Rights>${rights}</Rights>`,
    "</SessionInfo>",
  ].join("\n");
}

/**
 * A smart plug (power, temperature, switch, microphone) and a thermostat
 * (heat control, temperature) that is out of range.
 */
export const DEVICE_LIST_XML = `<?xml version="1.0" encoding="utf-8"?>
<devicelist version="1">
  <device identifier="11657 0240192" id="16" functionbitmask="35712" fwversion="04.16" manufacturer="AVM" productname="FRITZ!DECT 200">
    <present>1</present>
    <name>Living Room Plug</name>
    <switch><state>1</state><mode>manuell</mode><lock>0</lock><devicelock>1</devicelock></switch>
    <powermeter><power>12340</power><energy>707</energy><voltage>230500</voltage></powermeter>
    <temperature><celsius>215</celsius><offset>0</offset></temperature>
  </device>
  <device identifier="09995 0335100" id="17" functionbitmask="320" fwversion="04.94" manufacturer="AVM" productname="FRITZ!DECT 301">
    <present>0</present>
    <name>Bathroom Thermostat</name>
    <temperature><celsius>-35</celsius><offset>-5</offset></temperature>
  </device>
</devicelist>`;

export const TRAFFIC_KEYS = [
  "ds_bps_curr",
  "ds_mc_bps_curr",
  "ds_guest_bps_curr",
  "us_realtime_bps_curr",
  "us_important_bps_curr",
  "us_default_bps_curr",
  "us_background_bps_curr",
  "guest_us_bps",
] as const;

/**
 * Traffic monitor response whose newest bucket is `newest` in every stream.
 */
export function trafficJson(newest = 125000): string {
  const series = Array.from({ length: 20 }, (_, index) => (index === 0 ? newest : 1000 + index));
  const record: Record<string, ReadonlyArray<number>> = { prio_default_bps: series };
  for (const key of TRAFFIC_KEYS) {
    record[key] = series;
  }
  return JSON.stringify([record]);
}
