/**
 * modelgate - Main Entry Point
 *
 * Loads configuration, opens the database and serves the HTTP API.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { ConfigHolder, loadConfig, loadDotenv } from "./config.js";
import { closeDatabase, initDatabase } from "./db/index.js";
import { toErrorMessage } from "./errors.js";
import { createComponentLogger, getGatewayLogger, initGatewayLogging } from "./logging.js";
import { ContinuityStore, MemoryStore } from "./memory/index.js";
import { Gateway } from "./pipeline/index.js";
import { SessionManager, SessionStore } from "./session/index.js";

loadDotenv();
initGatewayLogging();

const log = createComponentLogger("main");

function start(): void {
  let config: ConfigHolder;
  try {
    config = new ConfigHolder(loadConfig());
  } catch (err) {
    log.fatal("Invalid configuration", err);
    process.exit(1);
  }

  const settings = config.current();
  const db = initDatabase(settings.dataDir);
  const sessions = new SessionManager(new SessionStore(db), { historyDepth: settings.session.historyDepth });
  const memory = new MemoryStore(db, settings.memory);
  const continuity = new ContinuityStore(db, settings.continuity);
  const gateway = new Gateway({ config, sessions, memory, continuity });
  const app = createApp(gateway);

  // SIGHUP re-reads the environment; an invalid result keeps the running config
  process.on("SIGHUP", () => {
    try {
      loadDotenv();
      config.swap(loadConfig());
    } catch (err) {
      log.error("Configuration reload rejected", err, { error: toErrorMessage(err) });
    }
  });

  const server = serve({ fetch: app.fetch, port: settings.port, hostname: settings.host }, (info) => {
    log.info("Gateway listening", {
      url: `http://${settings.host}:${info.port}`,
      provider: settings.defaultProvider,
      model: settings.defaultModel,
      dataDir: settings.dataDir,
    });
  });

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    server.close(() => {
      closeDatabase();
      void getGatewayLogger()
        .flush()
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start();
