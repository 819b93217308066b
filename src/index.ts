/**
 * Task Sync Server
 *
 * HTTP front end for the version-chain sync protocol used by Taskwarrior
 * 3.0+ replicas: https://gothenburgbitfactory.org/taskchampion/http.html
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { HTTPException } from "hono/http-exception";
import type { SyncEngine } from "./engine";
import { NoSuchClientError } from "./errors";
import {
  addSnapshot,
  addVersion,
  getChildVersion,
  getSnapshot,
} from "./handlers";
import { type Logger, silentLogger } from "./logger";
import { clientAllowlist } from "./middleware/auth";
import { requestLogging } from "./middleware/request-logging";

export const SERVER_NAME = "Task Sync Server";
export const SERVER_VERSION = "0.1.0";

/** 100MB, the largest history segment or snapshot accepted by default */
export const DEFAULT_MAX_BODY_BYTES = 100 * 1024 * 1024;

export interface AppOptions {
  engine: SyncEngine;
  /** Empty or absent: every client is allowed */
  allowClientIds?: Iterable<string>;
  maxBodyBytes?: number;
  logger?: Logger;
}

export function createApp(options: AppOptions): Hono {
  const { engine } = options;
  const logger = options.logger ?? silentLogger;
  const app = new Hono();

  app.use("*", requestLogging(logger.child({ module: "http" })));

  app.use("*", async (c, next) => {
    await next();
    c.header("Cache-Control", "no-store, max-age=0");
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (err instanceof NoSuchClientError) {
      return c.text("Forbidden: unknown client", 403);
    }
    logger.error({ err, method: c.req.method, path: c.req.path }, "internal server error");
    return c.text("Internal Server Error", 500);
  });

  // Health check (no auth required)
  app.get("/", (c) => {
    return c.text(`${SERVER_NAME} v${SERVER_VERSION}`);
  });

  // Apply client allowlist middleware to all /v1 routes
  app.use("/v1/*", clientAllowlist(options.allowClientIds ?? []));
  app.use(
    "/v1/*",
    bodyLimit({
      maxSize: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
      onError: (c) => c.text("Request body too large", 400),
    }),
  );

  // Sync protocol endpoints
  app.post("/v1/client/add-version/:parentVersionId", (c) => addVersion(c, engine));

  app.get("/v1/client/get-child-version/:parentVersionId", (c) =>
    getChildVersion(c, engine),
  );

  app.post("/v1/client/add-snapshot/:versionId", (c) => addSnapshot(c, engine));

  app.get("/v1/client/snapshot", (c) => getSnapshot(c, engine));

  return app;
}

export { SyncEngine } from "./engine";
export type {
  AddSnapshotResult,
  AddVersionResult,
  GetChildVersionResult,
  GetSnapshotResult,
  SyncEngineOptions,
  VersionRetention,
} from "./engine";
export * from "./errors";
export type { SnapshotPolicy } from "./snapshot-policy";
export * from "./storage";
export * from "./types";
