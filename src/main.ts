#!/usr/bin/env node
/**
 * NetVal service entry point.
 */

import { loadSettings } from "./config/settings";
import { log, setLogLevel } from "./logging/logger";
import { closeServer, createApplication, listen } from "./server";

async function main(): Promise<void> {
  const settings = await loadSettings();
  setLogLevel(settings.logLevel);

  const app = createApplication(settings);
  await listen(app.server, settings.port, settings.host);
  log.info(`${settings.appName} listening on http://${settings.host}:${settings.port} (data: ${settings.dataDir})`);

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`);
    closeServer(app.server)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(err);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error(err);
  process.exitCode = 1;
});
