/**
 * Lifecycle Module - HTTP Server
 *
 * Serves a hono app on Node's HTTP server and exposes the handle the
 * lifecycle drives.
 */
import { Server } from "node:http";
import type { Server as NetServer } from "node:net";

import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import { err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { shutdownFailed } from "./errors.js";
import type { HttpServerHandle, ListenAddress } from "./schema.js";

const log = createLogger("api");

export function startHttpServer(app: Hono, address: ListenAddress): HttpServerHandle {
  const server = serve(
    {
      fetch: app.fetch,
      hostname: address.host,
      port: address.port,
    },
    (info) => {
      log.info(
        { host: info.address, port: info.port },
        `Serving metrics on ${info.address}:${info.port}`,
      );
    },
  );
  const listener: NetServer = server;

  return {
    onError(callback) {
      listener.on("error", callback);
    },

    shutdown(graceMs) {
      if (!listener.listening) {
        return Promise.resolve(ok(undefined));
      }

      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          if (server instanceof Server) {
            server.closeAllConnections();
          }
          const message = `connections still open after ${graceMs}ms, closed them forcefully`;
          resolve(err(shutdownFailed(message)));
        }, graceMs);

        listener.close((error) => {
          clearTimeout(timer);
          resolve(error ? err(shutdownFailed(error.message, error)) : ok(undefined));
        });

        if (server instanceof Server) {
          server.closeIdleConnections();
        }
      });
    },
  };
}
