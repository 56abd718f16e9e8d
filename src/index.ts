#!/usr/bin/env node
import { CommanderError } from "commander";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";
import { createLogger } from "./logger";
import { MasterProxy } from "./masterProxy";
import { createNotifier } from "./notifier";

const logger = createLogger("Main");

async function main(): Promise<void> {
  const config = loadConfig();
  const proxy = new MasterProxy(config, { notifier: createNotifier() });

  proxy.setupShutdownHandler();
  await proxy.start();
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }

  if (error instanceof ConfigError) {
    logger.error("Configuration validation failed:");
    error.issues.forEach((issue) => logger.error(`  - ${issue}`));
  } else {
    logger.error(error instanceof Error ? error.message : error);
  }

  process.exit(1);
});
