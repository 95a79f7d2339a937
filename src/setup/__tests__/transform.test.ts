/**
 * Setup Transform Tests
 *
 * Answer validation and env-file rendering.
 */
import { parse } from "dotenv";
import { describe, expect, it } from "vitest";

import {
  expandHome,
  formatListenAddress,
  isConfirmation,
  pingUrl,
  quoteEnvValue,
  renderEnvFile,
  setupDefaults,
  toEnvironment,
  validateBaseUrl,
  validateInterval,
  validateListenAddress,
  validateUsername,
} from "../transform.js";

describe("Setup Transform", () => {
  // ===========================================================================
  // Answers
  // ===========================================================================

  describe("isConfirmation", () => {
    it.each(["y", "Y", "yes", " YES "])("accepts %j", (answer) => {
      expect(isConfirmation(answer)).toBe(true);
    });

    it.each(["", "n", "no", "yess"])("rejects %j", (answer) => {
      expect(isConfirmation(answer)).toBe(false);
    });
  });

  describe("expandHome", () => {
    it("replaces a leading ~/ with the home directory", () => {
      expect(expandHome("~/fritz/.env", "/home/exporter")).toBe("/home/exporter/fritz/.env");
    });

    it("leaves other paths alone", () => {
      expect(expandHome("./.env", "/home/exporter")).toBe("./.env");
    });
  });

  describe("validateListenAddress", () => {
    it("parses HOST:PORT", () => {
      expect(validateListenAddress("localhost:3000")._unsafeUnwrap()).toEqual({ host: "localhost", port: 3000 });
    });

    it("strips the brackets of an IPv6 host", () => {
      expect(validateListenAddress("[::]:9100")._unsafeUnwrap()).toEqual({ host: "::", port: 9100 });
    });

    it.each(["3000", ":3000", "localhost:70000"])("rejects %j", (text) => {
      expect(validateListenAddress(text)._unsafeUnwrapErr()).toBe(
        "This is not a valid address. Please use the HOST:PORT notation (e.g. localhost:3000)",
      );
    });
  });

  describe("validateInterval", () => {
    it("parses a duration", () => {
      expect(validateInterval("5m")._unsafeUnwrap()).toBe(300_000);
    });

    it("accepts the shortest allowed interval", () => {
      expect(validateInterval("10s")._unsafeUnwrap()).toBe(10_000);
    });

    it("rejects a shorter interval", () => {
      expect(validateInterval(" 5s ")._unsafeUnwrapErr()).toBe(
        'The interval "5s" is too short. Please choose a duration of at least 10 seconds.',
      );
    });

    it("rejects an interval longer than a timer can wait", () => {
      expect(validateInterval("720h")._unsafeUnwrapErr()).toBe(
        'The interval "720h" is too long. Please choose a duration of at most 24 days.',
      );
    });

    it("rejects text that is not a duration", () => {
      expect(validateInterval("soon")._unsafeUnwrapErr()).toBe(
        'Invalid interval. Please use a duration such as "5m" for five minutes or "30s" for thirty seconds.',
      );
    });
  });

  describe("validateBaseUrl", () => {
    it("accepts an http URL", () => {
      expect(validateBaseUrl(" http://192.168.178.1 ")._unsafeUnwrap()).toBe("http://192.168.178.1");
    });

    it("rejects https", () => {
      expect(validateBaseUrl("https://fritz.box")._unsafeUnwrapErr()).toBe(
        "Connecting to the FRITZ!Box via HTTPS is not supported. Please use http instead.",
      );
    });

    it("rejects other schemes", () => {
      expect(validateBaseUrl("ftp://fritz.box")._unsafeUnwrapErr()).toBe(
        'Unsupported URL scheme "ftp:". Please use http.',
      );
    });

    it("rejects text that is not a URL", () => {
      expect(validateBaseUrl("fritz box")._unsafeUnwrapErr()).toBe('"fritz box" is not a valid URL');
    });
  });

  describe("validateUsername", () => {
    it("trims the name", () => {
      expect(validateUsername(" admin ")._unsafeUnwrap()).toBe("admin");
    });

    it("rejects a blank name", () => {
      expect(validateUsername("  ")._unsafeUnwrapErr()).toBe(
        "The username cannot be empty and there is no sensible default",
      );
    });
  });

  // ===========================================================================
  // Addresses
  // ===========================================================================

  describe("formatListenAddress", () => {
    it("writes HOST:PORT", () => {
      expect(formatListenAddress({ host: "0.0.0.0", port: 3000 })).toBe("0.0.0.0:3000");
    });

    it("brackets an IPv6 host", () => {
      expect(formatListenAddress({ host: "::1", port: 9100 })).toBe("[::1]:9100");
    });
  });

  describe("pingUrl", () => {
    it("reaches an IPv4 wildcard through loopback", () => {
      expect(pingUrl({ host: "0.0.0.0", port: 3000 })).toBe("http://127.0.0.1:3000/ping");
    });

    it("reaches an IPv6 wildcard through loopback", () => {
      expect(pingUrl({ host: "::", port: 3000 })).toBe("http://[::1]:3000/ping");
    });

    it("keeps a concrete host", () => {
      expect(pingUrl({ host: "localhost", port: 9100 })).toBe("http://localhost:9100/ping");
    });
  });

  // ===========================================================================
  // Env File
  // ===========================================================================

  describe("setupDefaults", () => {
    it("falls back to the built-in defaults", () => {
      expect(setupDefaults({})).toEqual({
        LISTEN_ADDR: "0.0.0.0:3000",
        DEVICE_MONITORING_INTERVAL: "5m",
        FRITZBOX_BASE_URL: "http://fritz.box",
        FRITZBOX_USERNAME: "",
      });
    });

    it("prefers values from an existing file", () => {
      const defaults = setupDefaults({ LISTEN_ADDR: "localhost:9100", FRITZBOX_USERNAME: "admin" });

      expect(defaults.LISTEN_ADDR).toBe("localhost:9100");
      expect(defaults.FRITZBOX_USERNAME).toBe("admin");
    });
  });

  describe("toEnvironment", () => {
    it("writes every answer under its config key", () => {
      const env = toEnvironment({
        listenAddress: { host: "::", port: 3000 },
        deviceIntervalMs: 90_000,
        baseUrl: "http://fritz.box",
        username: "admin",
        password: "test-secret",
      });

      expect(Object.entries(env)).toEqual([
        ["LISTEN_ADDR", "[::]:3000"],
        ["DEVICE_MONITORING_INTERVAL", "90s"],
        ["FRITZBOX_BASE_URL", "http://fritz.box"],
        ["FRITZBOX_USERNAME", "admin"],
        ["FRITZBOX_PASSWORD", "test-secret"],
      ]);
    });

    it("keeps the other settings of the file being replaced", () => {
      const env = toEnvironment(
        {
          listenAddress: { host: "0.0.0.0", port: 3000 },
          deviceIntervalMs: 300_000,
          baseUrl: "http://fritz.box",
          username: "admin",
          password: "test-secret",
        },
        {
          FRITZBOX_PASSWORD: "old-secret",
          NETWORK_MONITORING_INTERVAL: "20s",
          LOG_LEVEL: "debug",
          REQUEST_TIMEOUT_MS: "5000",
        },
      );

      expect(Object.entries(env)).toEqual([
        ["LISTEN_ADDR", "0.0.0.0:3000"],
        ["DEVICE_MONITORING_INTERVAL", "5m"],
        ["FRITZBOX_BASE_URL", "http://fritz.box"],
        ["FRITZBOX_USERNAME", "admin"],
        ["FRITZBOX_PASSWORD", "test-secret"],
        ["NETWORK_MONITORING_INTERVAL", "20s"],
        ["LOG_LEVEL", "debug"],
        ["REQUEST_TIMEOUT_MS", "5000"],
      ]);
    });
  });

  describe("quoteEnvValue", () => {
    it("leaves plain values bare", () => {
      expect(quoteEnvValue("test-secret")).toBe("test-secret");
    });

    it("single-quotes values with spaces", () => {
      expect(quoteEnvValue("test secret")).toBe("'test secret'");
    });

    it("falls back to backticks for a value with a single quote", () => {
      expect(quoteEnvValue("it's #1")).toBe("`it's #1`");
    });

    it("falls back to double quotes for a value with both", () => {
      expect(quoteEnvValue("it's `#1`")).toBe("\"it's `#1`\"");
    });

    it("gives up on a value with every kind of quote", () => {
      expect(quoteEnvValue("'`\"")).toBeNull();
    });

    it("gives up on an escape sequence double quotes would expand", () => {
      expect(quoteEnvValue("it's `a\\nb`")).toBeNull();
    });

    it("gives up on a line break", () => {
      expect(quoteEnvValue("test\nsecret")).toBeNull();
    });
  });

  describe("renderEnvFile", () => {
    it("writes a header and one line per key", () => {
      const rendered = renderEnvFile({ FRITZBOX_USERNAME: "admin", FRITZBOX_PASSWORD: "test secret" });

      expect(rendered._unsafeUnwrap()).toBe(
        [
          "# FRITZ!Box exporter configuration, written by `fritz-metrics setup`.",
          "# It is read once at startup: restart the exporter after editing.",
          "FRITZBOX_USERNAME=admin",
          "FRITZBOX_PASSWORD='test secret'",
          "",
        ].join("\n"),
      );
    });

    it("is read back unchanged", () => {
      const env = {
        LISTEN_ADDR: "[::]:3000",
        FRITZBOX_USERNAME: "admin",
        FRITZBOX_PASSWORD: "p@ss w#rd",
        APP_NAME: "it's `quoted`",
        LOG_LEVEL: "it's #1",
      };

      const rendered = renderEnvFile(env)._unsafeUnwrap();

      expect(parse(rendered)).toEqual(env);
    });

    it("names the key that cannot be written", () => {
      const rendered = renderEnvFile({ FRITZBOX_USERNAME: "admin", FRITZBOX_PASSWORD: "test\nsecret" });

      expect(rendered._unsafeUnwrapErr()).toBe(
        "FRITZBOX_PASSWORD contains a combination of quotes that cannot be written to an env file",
      );
    });
  });
});
