#!/usr/bin/env node
import "dotenv/config";
import { createLogger } from "@perp/futures-core";
import { loadConfig } from "./config.js";
import { describeFailure, parseCli, runConnectivityTest, startTrading } from "./runner.js";

const log = createLogger("runner");

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

async function main() {
  const cli = parseCli(process.argv.slice(2));
  const config = loadConfig(cli.configPath);
  log.info("config loaded", { path: cli.configPath, mode: cli.mode });

  if (cli.mode === "test") {
    await runConnectivityTest(config, log);
    return;
  }

  const runtime = await startTrading(config, cli.mode, log);
  const signal = await waitForShutdownSignal();
  log.info("shutdown requested", { signal });
  await runtime.stop();
}

main().catch((error) => {
  const failure = describeFailure(error);
  log.error(failure.msg, failure.meta);
  process.exit(1);
});
