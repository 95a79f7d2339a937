/**
 * FRITZ!Box Module - Session Manager
 *
 * Owns the one login session shared by every caller. All access goes through
 * a single queue, so at most one handshake is ever in flight and callers see
 * the session of the handshake that ran before theirs.
 *
 * Handshake (see AVM's "Session ID" technical note):
 * 1. GET login_sid.lua with the cached SID. A still-valid SID comes back as is;
 *    otherwise the router answers with the zero SID and a fresh challenge.
 * 2. GET login_sid.lua with `response` = solved challenge and `username`.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger, maskSecret } from "../logger.js";
import { type FritzBoxError, authFailed, withContext } from "./errors.js";
import { EMPTY_SESSION, LOGIN_PATH, type Session } from "./schema.js";
import { decodeSession, isValidSessionId, solveChallenge } from "./transform.js";
import type { Transport } from "./transport.js";

const log = createLogger("session");

export type SessionManager = Readonly<{
  /**
   * Return a valid session id, logging in first if the router no longer
   * accepts the cached one.
   */
  getSessionToken(signal?: AbortSignal): Promise<Result<string, FritzBoxError>>;
  /**
   * End the session on the router. A no-op without a session.
   */
  logout(signal?: AbortSignal): Promise<Result<void, FritzBoxError>>;
  /**
   * Snapshot of the current session, for diagnostics.
   */
  getSession(): Session;
}>;

export type SessionManagerOptions = Readonly<{
  transport: Transport;
  username: string;
  password: string;
}>;

export function createSessionManager(options: SessionManagerOptions): SessionManager {
  const { transport, username, password } = options;

  let session: Session = EMPTY_SESSION;
  let queue: Promise<unknown> = Promise.resolve();

  /**
   * Run a task after every previously queued one has settled.
   */
  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task, task);
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async function requestSession(
    params: ReadonlyArray<readonly [string, string]>,
    signal: AbortSignal | undefined,
  ): Promise<Result<Session, FritzBoxError>> {
    const response = await transport.get(LOGIN_PATH, params, signal);
    return response.andThen(decodeSession);
  }

  async function login(signal: AbortSignal | undefined): Promise<Result<string, FritzBoxError>> {
    const challengeResult = await requestSession([["sid", session.sessionId]], signal);
    if (challengeResult.isErr()) {
      return err(withContext("failed to get login challenge", challengeResult.error));
    }

    session = challengeResult.value;
    if (isValidSessionId(session.sessionId)) {
      return ok(session.sessionId);
    }

    log.debug("Authenticating new session at FRITZ!Box");

    const responseResult = await requestSession(
      [
        ["response", solveChallenge(session.challenge, password)],
        ["username", username],
      ],
      signal,
    );
    if (responseResult.isErr()) {
      return err(withContext("failed to submit challenge response", responseResult.error));
    }

    session = responseResult.value;
    if (!isValidSessionId(session.sessionId)) {
      return err(
        authFailed(
          "failed to solve authentication challenge, check username and password",
          session.blockTimeMs,
        ),
      );
    }

    log.info(
      { sid: maskSecret(session.sessionId), permissions: [...session.permissions] },
      "Logged in to FRITZ!Box",
    );
    return ok(session.sessionId);
  }

  return {
    getSessionToken(signal) {
      return serialize(() => login(signal));
    },

    logout(signal) {
      return serialize(async () => {
        if (!isValidSessionId(session.sessionId)) {
          return ok(undefined);
        }

        log.debug("Logging out from FRITZ!Box");
        const result = await transport.get(
          LOGIN_PATH,
          [
            ["sid", session.sessionId],
            ["logout", "true"],
          ],
          signal,
        );
        session = EMPTY_SESSION;

        return result.map(() => undefined);
      });
    },

    getSession() {
      return session;
    },
  };
}
