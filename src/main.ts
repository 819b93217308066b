/**
 * Server entry point: load configuration, open storage, listen.
 */

import { type ServerType, serve } from "@hono/node-server";
import { CommanderError } from "commander";
import { loadConfig, type ServerConfig } from "./config";
import { SyncEngine } from "./engine";
import { ConfigError } from "./errors";
import { createApp } from "./index";
import { createLogger, type Logger } from "./logger";
import { createStorage, type Storage } from "./storage";

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version have already printed their output
      if (error.exitCode === 0) process.exit(0);
      console.error(error.message);
      process.exit(2);
    }
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(2);
    }
    throw error;
  }
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function handleShutdown(servers: ServerType[], storage: Storage, logger: Logger): void {
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "shutting down");

    const results = await Promise.allSettled(servers.map(closeServer));
    for (const result of results) {
      if (result.status === "rejected") {
        logger.error({ err: result.reason }, "error closing listener");
      }
    }

    try {
      await storage.close();
    } catch (err) {
      logger.error({ err }, "error closing storage");
      process.exitCode = 1;
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, (received) => {
      shutdown(received).catch((err: unknown) => {
        logger.fatal({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

const config = readConfig();
const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });

let storage: Storage;
try {
  storage = createStorage(config);
} catch (err) {
  logger.fatal({ err, storage: config.storage }, "could not open storage");
  process.exit(1);
}

const engine = new SyncEngine({
  storage,
  snapshotPolicy: { versions: config.snapshotVersions, days: config.snapshotDays },
  createClients: config.createClients,
  versionRetention: config.versionRetention,
  logger,
});

const app = createApp({
  engine,
  allowClientIds: config.allowClientIds,
  maxBodyBytes: config.maxBodyBytes,
  logger,
});

const servers = config.listen.map(({ hostname, port }) =>
  serve({ fetch: app.fetch, hostname, port }, (info) => {
    logger.info({ address: info.address, port: info.port }, `Serving on ${hostname}:${info.port}`);
  }),
);

logger.info(
  {
    storage: config.storage,
    createClients: config.createClients,
    allowlist: config.allowClientIds.length,
    versionRetention: config.versionRetention,
  },
  "sync server started",
);

handleShutdown(servers, storage, logger);
