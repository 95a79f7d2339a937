/**
 * FRITZ!Box Module - Service Layer
 *
 * Data calls against the router. Every call obtains a session id first, so
 * no request for data is ever sent without one.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type FritzBoxError, invalidUrl, withContext } from "./errors.js";
import {
  type Device,
  HOME_AUTOMATION_PATH,
  TRAFFIC_MONITOR_PATH,
  type TrafficSnapshot,
} from "./schema.js";
import { type SessionManager, createSessionManager } from "./session.js";
import { type QueryParams, decodeDeviceList, decodeTrafficSnapshot } from "./transform.js";
import { type Transport, createTransport } from "./transport.js";

const log = createLogger("fritzbox");

export type FritzBoxClient = Readonly<{
  /** Smart-home devices known to the router. */
  getDevices(signal?: AbortSignal): Promise<Result<ReadonlyArray<Device>, FritzBoxError>>;
  /** Current upstream/downstream traffic. */
  getTrafficSnapshot(signal?: AbortSignal): Promise<Result<TrafficSnapshot, FritzBoxError>>;
  /** Log out of the router. */
  close(signal?: AbortSignal): Promise<Result<void, FritzBoxError>>;
}>;

export type FritzBoxClientOptions = Readonly<{
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}>;

/**
 * Build a client from configuration.
 */
export function createFritzBoxClient(
  options: FritzBoxClientOptions,
): Result<FritzBoxClient, FritzBoxError> {
  let baseUrl: URL;
  try {
    baseUrl = new URL(options.baseUrl);
  } catch {
    return err(invalidUrl(`"${options.baseUrl}" is not a valid base URL`));
  }

  const transport = createTransport({ baseUrl, timeoutMs: options.timeoutMs });
  const sessions = createSessionManager({
    transport,
    username: options.username,
    password: options.password,
  });

  return ok(createClient(transport, sessions));
}

/**
 * Assemble a client from its collaborators.
 */
export function createClient(transport: Transport, sessions: SessionManager): FritzBoxClient {
  async function homeAutomationCommand(
    command: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<string, FritzBoxError>> {
    const sid = await sessions.getSessionToken(signal);
    if (sid.isErr()) {
      return err(sid.error);
    }

    const params: QueryParams = [
      ["sid", sid.value],
      ["switchcmd", command],
    ];
    const response = await transport.get(HOME_AUTOMATION_PATH, params, signal);
    return response.mapErr((error) => withContext(command, error));
  }

  return {
    async getDevices(signal) {
      log.debug("Requesting list of devices");

      const body = await homeAutomationCommand("getdevicelistinfos", signal);
      return body.andThen(decodeDeviceList);
    },

    async getTrafficSnapshot(signal) {
      log.debug("Requesting traffic monitor data");

      const sid = await sessions.getSessionToken(signal);
      if (sid.isErr()) {
        return err(sid.error);
      }

      const response = await transport.get(
        TRAFFIC_MONITOR_PATH,
        [
          ["sid", sid.value],
          ["myXhr", "1"],
          ["xhr", "1"],
          ["useajax", "1"],
          ["action", "get_graphic"],
        ],
        signal,
      );

      return response
        .mapErr((error) => withContext("inetstat_monitor.lua", error))
        .andThen(decodeTrafficSnapshot);
    },

    close(signal) {
      return sessions.logout(signal);
    },
  };
}
