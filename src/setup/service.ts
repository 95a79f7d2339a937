/**
 * Setup Module - Interactive Wizard
 *
 * Asks for everything the exporter needs, checks each answer against the
 * live system where it can (binding the listen address, listing devices)
 * and writes the env file. Invalid answers are asked again.
 */
import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import type { Server as NetServer } from "node:net";
import type { Readable, Writable } from "node:stream";

import { serve } from "@hono/node-server";
import { parse as parseDotenv } from "dotenv";
import { Hono } from "hono";
import { type Result, err, ok } from "neverthrow";

import { formatConfigError, parseConfig } from "../config.js";
import { createFritzBoxClient, formatFritzBoxError } from "../fritzbox/index.js";
import type { ListenAddress } from "../lifecycle/index.js";
import { type SetupError, aborted, writeFailed } from "./errors.js";
import { DEFAULT_ENV_FILE, type SetupAnswers } from "./schema.js";
import {
  expandHome,
  formatListenAddress,
  isConfirmation,
  pingUrl,
  renderEnvFile,
  setupDefaults,
  toEnvironment,
  validateBaseUrl,
  validateInterval,
  validateListenAddress,
  validateUsername,
} from "./transform.js";

const PROBE_TIMEOUT_MS = 2000;
const CONNECTION_TEST_TIMEOUT_MS = 10_000;

export type SetupOptions = Readonly<{
  input: Readable;
  output: Writable;
}>;

/**
 * Run the wizard.
 *
 * @returns Absolute path of the written env file
 */
export async function runSetup(options: SetupOptions): Promise<Result<string, SetupError>> {
  const { output } = options;
  const cancel = new AbortController();
  const rl = createInterface({ input: options.input, output });
  rl.on("SIGINT", () => cancel.abort());

  const say = (line = "") => {
    output.write(`${line}\n`);
  };

  async function ask(question: string, defaultValue = ""): Promise<Result<string, SetupError>> {
    const prompt = defaultValue ? `> ${question} [${defaultValue}] : ` : `> ${question} : `;
    try {
      const answer = (await rl.question(prompt, { signal: cancel.signal })).trim();
      return ok(answer === "" ? defaultValue : answer);
    } catch {
      return err(aborted("no more input"));
    }
  }

  async function askUntilValid<T>(
    question: string,
    defaultValue: string,
    validate: (answer: string) => Result<T, string> | Promise<Result<T, string>>,
  ): Promise<Result<T, SetupError>> {
    for (;;) {
      const answer = await ask(question, defaultValue);
      if (answer.isErr()) {
        return err(answer.error);
      }

      const valid = await validate(answer.value);
      if (valid.isOk()) {
        return ok(valid.value);
      }
      say(`  ✘ ${valid.error}`);
    }
  }

  try {
    say("~~ FRITZ!Box Exporter Setup ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~");
    say("This setup creates an env file so the exporter can access your FRITZ!Box.");
    say("The values in brackets are the defaults. Abort at any time with ctrl+c,");
    say("nothing is written before the last step.");
    say();

    // Env file location
    const pathAnswer = await ask(
      "Where do you want to store your configuration file?",
      DEFAULT_ENV_FILE,
    );
    if (pathAnswer.isErr()) return err(pathAnswer.error);
    const envPath = resolve(expandHome(pathAnswer.value, homedir()));

    say("  Checking if a configuration file already exists at this location...");
    let existing: Record<string, string> = {};
    if (existsSync(envPath)) {
      say(`  ✘ There is already a file at "${envPath}"`);
      const contents = await readEnvFile(envPath);
      if (contents.isErr()) {
        say(`  ✘ The file cannot be read: ${contents.error}`);
      } else {
        existing = contents.value;
        const current = parseConfig(existing);
        if (current.isErr()) {
          say("  ✘ The file cannot be loaded as configuration:");
          for (const line of formatConfigError(current.error).split("\n")) say(`    ${line}`);
        } else {
          say("  ✔ The existing config file is valid");
        }
      }

      const overwrite = await ask("Do you want to overwrite this file?", "no");
      if (overwrite.isErr()) return err(overwrite.error);
      if (!isConfirmation(overwrite.value)) {
        say("  Aborting setup. Have a nice day!");
        return err(aborted(`kept existing file at ${envPath}`));
      }
    } else {
      say(`  ✔ No file found at "${envPath}"`);
    }

    const defaults = setupDefaults(existing);

    // Listen address
    const listenAddress = await askUntilValid(
      "At which address should the exporter open its HTTP server?",
      defaults.LISTEN_ADDR,
      async (answer) => {
        const address = validateListenAddress(answer);
        if (address.isErr()) return address;

        say("  Checking if we can use this address to open an HTTP server...");
        const probe = await probeListenAddress(address.value);
        if (probe.isErr()) return err(probe.error);

        say("  ✔ The listen address is valid and can be used");
        return address;
      },
    );
    if (listenAddress.isErr()) return err(listenAddress.error);

    // Device polling interval
    const deviceIntervalMs = await askUntilValid(
      "At which interval should the exporter request device metrics from the FRITZ!Box?",
      defaults.DEVICE_MONITORING_INTERVAL,
      validateInterval,
    );
    if (deviceIntervalMs.isErr()) return err(deviceIntervalMs.error);
    say("  ✔ The interval is valid and can be used");

    // Router connection
    const baseUrl = await askUntilValid(
      "What is the URL of your FRITZ!Box?",
      defaults.FRITZBOX_BASE_URL,
      validateBaseUrl,
    );
    if (baseUrl.isErr()) return err(baseUrl.error);

    const username = await askUntilValid(
      "Which FRITZ!Box user should the exporter log in as?",
      defaults.FRITZBOX_USERNAME,
      validateUsername,
    );
    if (username.isErr()) return err(username.error);

    const password = await ask(
      "What is the password of this user? It is stored in plaintext and shown here while you type",
    );
    if (password.isErr()) return err(password.error);

    const answers: SetupAnswers = {
      listenAddress: listenAddress.value,
      deviceIntervalMs: deviceIntervalMs.value,
      baseUrl: baseUrl.value,
      username: username.value,
      password: password.value,
    };

    say("  Checking connection to FRITZ!Box by listing connected smart-home devices...");
    say(`  ${await testConnection(answers)}`);

    // Final checks
    const env = toEnvironment(answers, existing);
    say("  Running final checks on configuration...");
    const config = parseConfig(env);
    if (config.isErr()) {
      say("  ✘ Issues found:");
      for (const line of formatConfigError(config.error).split("\n")) say(`    ${line}`);
    }

    const content = renderEnvFile(env);
    if (content.isErr()) {
      return err(writeFailed(envPath, content.error));
    }

    try {
      await writeFile(envPath, content.value, { encoding: "utf8", mode: 0o600 });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      return err(writeFailed(envPath, cause?.message ?? String(error), cause));
    }

    say();
    say(`Your configuration file has been saved to "${envPath}"`);
    say();
    say("You can edit that file manually at any time. The exporter reads it once");
    say("when it starts, so restart it for your changes to take effect.");
    say();
    say("You can start the exporter with this command:");
    say();
    say(`  fritz-metrics --config ${envPath}`);
    say();
    say(`It will serve metrics at http://${formatListenAddress(answers.listenAddress)}/metrics`);
    return ok(envPath);
  } finally {
    rl.close();
  }
}

async function readEnvFile(path: string): Promise<Result<Record<string, string>, string>> {
  try {
    return ok(parseDotenv(await readFile(path, "utf8")));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Bind a throwaway server to the address and request it once.
 */
async function probeListenAddress(address: ListenAddress): Promise<Result<void, string>> {
  const app = new Hono();
  app.get("/ping", (c) => c.text("pong"));

  const listening = await new Promise<Result<NetServer, string>>((settle) => {
    const server: NetServer = serve(
      { fetch: app.fetch, hostname: address.host, port: address.port },
      () => settle(ok(server)),
    );
    server.once("error", (error) =>
      settle(
        err(
          "There was an error opening the HTTP server at " +
            `"${formatListenAddress(address)}": ${error.message}`,
        ),
      ),
    );
  });
  if (listening.isErr()) {
    return err(listening.error);
  }

  const server = listening.value;
  try {
    const response = await fetch(pingUrl(address), {
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
    if (response.status !== 200) {
      return err(`The server responded with an unexpected status code: ${response.status}`);
    }
    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(`There was an error sending HTTP requests to the server: ${message}`);
  } finally {
    server.close();
  }
}

/**
 * List devices with the given credentials.
 *
 * @returns The line reported to the operator
 */
async function testConnection(answers: SetupAnswers): Promise<string> {
  const client = createFritzBoxClient({
    baseUrl: answers.baseUrl,
    username: answers.username,
    password: answers.password,
    timeoutMs: CONNECTION_TEST_TIMEOUT_MS,
  });
  if (client.isErr()) {
    return `✘ Failed to create FRITZ!Box client: ${formatFritzBoxError(client.error)}`;
  }

  const devices = await client.value.getDevices();
  const line = devices.isErr()
    ? `✘ Failed to list devices: ${formatFritzBoxError(devices.error)}`
    : "✔ Connection to FRITZ!Box API is working " +
      `(found ${devices.value.length} smart-home devices)`;

  await client.value.close(AbortSignal.timeout(CONNECTION_TEST_TIMEOUT_MS));
  return line;
}
