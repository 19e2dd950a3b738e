#!/usr/bin/env node
/**
 * Relay server entry point: flags/env -> relay configuration -> registry -> listen.
 * Any configuration or template error stops the process before it listens.
 */

import chalk from "chalk";
import "dotenv/config";
import type { Server } from "http";
import { parseProcessConfig } from "./config/env";
import { loadRelayConfig } from "./config/relayConfig";
import { SERVICE_NAME, SERVICE_VERSION } from "./config/service";
import { RelayConfigValidator } from "./domain/validators/RelayConfigValidator";
import { describeError } from "./domain/errors/RelayErrors";
import { configureLogger, logger } from "./infrastructure/logger";
import { buildRelay } from "./server";

const printBanner = (address: string, port: number, rows: string[], healthCheckEnabled: boolean) => {
  console.log("\n" + chalk.cyan("═".repeat(60)));
  console.log(chalk.bold.blue(`  [${SERVICE_NAME.toUpperCase()} ${SERVICE_VERSION}]`));
  console.log(chalk.cyan("═".repeat(60)));
  console.log(chalk.green(`  [OK] Listening:      http://${address}:${port}`));
  if (healthCheckEnabled) {
    console.log(chalk.green(`  [OK] Health Check:   http://${address}:${port}/health`));
  }
  console.log(chalk.cyan("═".repeat(60)));
  console.log(chalk.magenta(`  [ENDPOINTS] ${rows.length} registered:`));
  for (const row of rows) {
    console.log(chalk.white(`     • ${row}`));
  }
  console.log(chalk.cyan("═".repeat(60)) + "\n");
};

const bootstrap = async () => {
  const processConfig = parseProcessConfig(process.argv.slice(2));
  configureLogger({ level: processConfig.logLevel, format: processConfig.logFormat });

  const relayConfig = await loadRelayConfig(processConfig.config);
  logger.info({
    type: "CONFIG_LOADED",
    message: "Relay configuration loaded",
    payload: { path: processConfig.config, registers: relayConfig.registers.length },
  });
  for (const warning of RelayConfigValidator.warnings(relayConfig)) {
    logger.warn({ type: "CONFIG_WARNING", message: warning });
  }

  const { app, registry } = buildRelay(relayConfig, {
    requestTimeoutSeconds: processConfig.requestTimeout,
    healthCheckEnabled: processConfig.healthCheckEnabled,
    collectDefaultMetrics: true,
  });

  const rows = relayConfig.registers.map(
    (r) => `${r.method.toUpperCase()} ${r.endpoint} -> ${r.target.method.toUpperCase()} ${r.target.url}`,
  );

  const server: Server = app.listen(processConfig.port, processConfig.bindAddress, () => {
    printBanner(processConfig.bindAddress, processConfig.port, rows, processConfig.healthCheckEnabled);
    logger.info({
      type: "SERVER_STARTED",
      message: "Webhook relay started",
      payload: {
        address: processConfig.bindAddress,
        port: processConfig.port,
        endpoints: registry.size,
      },
    });
  });
  server.maxConnections = processConfig.maxConcurrentRequests;

  server.on("error", (err: NodeJS.ErrnoException) => {
    logger.error({
      type: err.code === "EADDRINUSE" ? "SERVER_PORT_IN_USE" : "SERVER_START_ERROR",
      message: `Failed to start server: ${err.message}`,
      error: err,
      payload: { port: processConfig.port },
    });
    process.exit(1);
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({
      type: "SERVER_SHUTDOWN_REQUESTED",
      message: "Shutting down, waiting for in-flight requests",
      payload: { signal },
    });
    // close() stops accepting connections and resolves once in-flight requests finish
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    logger.info({ type: "SERVER_SHUTDOWN_COMPLETE", message: "Server stopped" });
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      logger.error({ type: "SERVER_SHUTDOWN_FAILED", message: "Shutdown failed", error: err });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((err) => {
    logger.error({
      type: "SERVER_BOOTSTRAP_FAILED",
      message: "Bootstrap failed",
      error: err,
    });
    console.error(chalk.red(`\n❌ Fatal: ${describeError(err)}\n`));
    process.exit(1);
  });
}
