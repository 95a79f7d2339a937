#!/usr/bin/env node
/**
 * FRITZ!Box Exporter - Application Entry Point
 *
 * Polls a FRITZ!Box for smart-home device and network traffic metrics and
 * serves them for Prometheus at /metrics.
 *
 *   fritz-metrics [--config .env] [--debug]   run the exporter
 *   fritz-metrics setup                        create an env file interactively
 */
import { Command } from "commander";

import { createApp } from "./api/app.js";
import { type Config, formatConfigError, formatDuration, loadConfig } from "./config.js";
import { createFritzBoxClient, formatFritzBoxError } from "./fritzbox/index.js";
import {
  createCollectionLoops,
  formatLifecycleError,
  runLifecycle,
  startHttpServer,
} from "./lifecycle/index.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createMetrics } from "./metrics/index.js";
import { createScheduler } from "./scheduler/index.js";
import { DEFAULT_ENV_FILE, formatSetupError, runSetup } from "./setup/index.js";

const log = createLogger("lifecycle");

const TERMINATION_SIGNALS = ["SIGINT", "SIGQUIT", "SIGTERM"] as const;

type CliOptions = {
  config: string;
  debug: boolean;
};

// =============================================================================
// Exporter
// =============================================================================

function printBanner(config: Config): void {
  console.log("");
  console.log("========================================");
  console.log("  FRITZ!BOX METRICS EXPORTER");
  console.log("========================================");
  console.log("");

  // Non-sensitive values only
  log.info(
    {
      listenAddr: `${config.LISTEN_ADDR.host}:${config.LISTEN_ADDR.port}`,
      env: config.NODE_ENV,
      baseUrl: config.FRITZBOX_BASE_URL,
      username: config.FRITZBOX_USERNAME,
      deviceInterval: formatDuration(config.DEVICE_MONITORING_INTERVAL),
      networkInterval: formatDuration(config.NETWORK_MONITORING_INTERVAL),
    },
    "Configuration loaded",
  );
}

async function runExporter(options: CliOptions): Promise<number> {
  const loaded = loadConfig(options.config);
  if (loaded.isErr()) {
    console.error(formatConfigError(loaded.error));
    return 1;
  }

  const config = loaded.value;
  setLogLevel(options.debug ? "debug" : config.LOG_LEVEL);
  printBanner(config);

  const client = createFritzBoxClient({
    baseUrl: config.FRITZBOX_BASE_URL,
    username: config.FRITZBOX_USERNAME,
    password: config.FRITZBOX_PASSWORD,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  });
  if (client.isErr()) {
    log.fatal({ error: formatFritzBoxError(client.error) }, "Failed to create FRITZ!Box client");
    return 1;
  }

  const metrics = createMetrics();
  const scheduler = createScheduler(
    createCollectionLoops({
      client: client.value,
      metrics,
      deviceIntervalMs: config.DEVICE_MONITORING_INTERVAL,
      networkIntervalMs: config.NETWORK_MONITORING_INTERVAL,
    }),
  );

  const app = createApp({ registry: metrics.registry, getLoopStates: scheduler.getState });
  const server = startHttpServer(app, config.LISTEN_ADDR);

  const termination = new AbortController();
  for (const signal of TERMINATION_SIGNALS) {
    process.on(signal, () => {
      if (termination.signal.aborted) {
        log.info({ signal }, `${signal} received. Already shutting down...`);
        return;
      }
      log.info({ signal }, `${signal} received. Shutting down gracefully...`);
      termination.abort();
    });
  }

  log.info(`🚀 ${config.APP_NAME} starting`);

  const result = await runLifecycle({
    client: client.value,
    scheduler,
    server,
    signal: termination.signal,
    shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
    logoutTimeoutMs: config.LOGOUT_TIMEOUT_MS,
  });

  if (result.isErr()) {
    log.error({ error: formatLifecycleError(result.error) }, "Exporter stopped after a failure");
    return 1;
  }
  return 0;
}

// =============================================================================
// CLI
// =============================================================================

const program = new Command();

program
  .name("fritz-metrics")
  .description("Prometheus exporter for FRITZ!Box smart-home and network metrics")
  .version("1.0.0")
  .option("-c, --config <file>", "env file to load configuration from", DEFAULT_ENV_FILE)
  .option("-d, --debug", "enable debug logging", false)
  .action(async () => {
    process.exitCode = await runExporter(program.opts<CliOptions>());
  });

program
  .command("setup")
  .description("create a configuration file interactively")
  .action(async () => {
    const result = await runSetup({ input: process.stdin, output: process.stdout });
    if (result.isErr()) {
      console.error(formatSetupError(result.error));
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
