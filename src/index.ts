#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { LOG_FILE } from "./env";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = await buildApplication();
  await app.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", err);
    }
    await loggingHandle.shutdown();
  };

  process.on("SIGINT", () => {
    shutdown().finally(() => process.exit(0));
  });

  await app.waitForExit();
  await shutdown();
  process.exit(0);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
