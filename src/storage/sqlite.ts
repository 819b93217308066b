/**
 * SQLite Storage Backend
 *
 * Embedded single-writer store for small deployments. Writes run inside
 * `BEGIN IMMEDIATE` transactions, which take the database write lock up front,
 * so two processes sharing the file still serialize their check-then-write.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";
import {
  ClientAlreadyExistsError,
  NoSuchClientError,
  toStorageError,
} from "../errors";
import type {
  Client,
  ClientId,
  HistorySegment,
  Snapshot,
  SnapshotData,
  Version,
  VersionId,
} from "../types";
import { NIL_VERSION_ID } from "../types";
import {
  type AddSnapshotOptions,
  type AddSnapshotOutcome,
  type AddVersionOutcome,
  emptyClient,
  type Storage,
} from "./storage";

export const SQLITE_FILE_NAME = "sync-server.sqlite3";

export interface SqliteStorageConfig {
  /** Directory holding the database file; created if missing */
  dataDir?: string;
  /** Use an already-open database instead of `dataDir` */
  database?: DatabaseInstance;
}

interface ClientRow {
  client_id: string;
  latest_version_id: string;
  snapshot_version_id: string | null;
  versions_since_snapshot: number;
  snapshot_timestamp: number | null;
}

interface VersionRow {
  version_id: string;
  parent_version_id: string;
  history_segment: Buffer;
}

interface SnapshotRow {
  snapshot_version_id: string | null;
  snapshot: Buffer | null;
}

function prepareStatements(db: DatabaseInstance) {
  return {
    getClient: db.prepare<[string], ClientRow>(
      `SELECT client_id, latest_version_id, snapshot_version_id,
              versions_since_snapshot, snapshot_timestamp
         FROM clients WHERE client_id = ?`,
    ),
    insertClient: db.prepare<[string, string]>(
      "INSERT INTO clients (client_id, latest_version_id) VALUES (?, ?)",
    ),
    getVersionByParent: db.prepare<[string, string], VersionRow>(
      `SELECT version_id, parent_version_id, history_segment
         FROM versions WHERE client_id = ? AND parent_version_id = ?`,
    ),
    insertVersion: db.prepare<[string, string, string, Buffer]>(
      `INSERT INTO versions (client_id, version_id, parent_version_id, history_segment)
       VALUES (?, ?, ?, ?)`,
    ),
    advanceHead: db.prepare<[string, string]>(
      `UPDATE clients
          SET latest_version_id = ?,
              versions_since_snapshot = versions_since_snapshot + 1
        WHERE client_id = ?`,
    ),
    setSnapshot: db.prepare<[string, number, Buffer, string]>(
      `UPDATE clients
          SET snapshot_version_id = ?,
              snapshot_timestamp = ?,
              versions_since_snapshot = 0,
              snapshot = ?
        WHERE client_id = ?`,
    ),
    pruneVersions: db.prepare<[string, string]>(
      "DELETE FROM versions WHERE client_id = ? AND version_id <> ?",
    ),
    getSnapshot: db.prepare<[string], SnapshotRow>(
      "SELECT snapshot_version_id, snapshot FROM clients WHERE client_id = ?",
    ),
  };
}

type PreparedStatements = ReturnType<typeof prepareStatements>;

export class SqliteStorage implements Storage {
  private readonly db: DatabaseInstance;
  private readonly statements: PreparedStatements;

  constructor(config: SqliteStorageConfig) {
    this.db = config.database ?? openDatabase(config.dataDir);
    initSchema(this.db);
    this.statements = prepareStatements(this.db);
  }

  async getClient(clientId: ClientId): Promise<Client | null> {
    return this.run("Error getting client", () => {
      const row = this.statements.getClient.get(clientId);
      return row ? mapClient(row) : null;
    });
  }

  async createClient(clientId: ClientId): Promise<Client> {
    return this.run("Error creating client", () =>
      this.db
        .transaction(() => {
          if (this.statements.getClient.get(clientId)) {
            throw new ClientAlreadyExistsError(clientId);
          }
          this.statements.insertClient.run(clientId, NIL_VERSION_ID);
          return emptyClient(clientId);
        })
        .immediate(),
    );
  }

  async getVersionByParent(
    clientId: ClientId,
    parentVersionId: VersionId,
  ): Promise<Version | null> {
    return this.run("Error getting version", () => {
      const row = this.statements.getVersionByParent.get(
        clientId,
        parentVersionId,
      );
      return row ? mapVersion(row) : null;
    });
  }

  async addVersion(
    clientId: ClientId,
    parentVersionId: VersionId,
    newVersionId: VersionId,
    historySegment: HistorySegment,
  ): Promise<AddVersionOutcome> {
    return this.run("Error adding version", () =>
      this.db
        .transaction((): AddVersionOutcome => {
          const row = this.requireClient(clientId);
          if (row.latest_version_id !== parentVersionId) {
            return { status: "conflict", latestVersionId: row.latest_version_id };
          }

          this.statements.insertVersion.run(
            clientId,
            newVersionId,
            parentVersionId,
            toBuffer(historySegment),
          );
          this.statements.advanceHead.run(newVersionId, clientId);

          return { status: "committed", client: mapClient(this.requireClient(clientId)) };
        })
        .immediate(),
    );
  }

  async addSnapshot(
    clientId: ClientId,
    versionId: VersionId,
    data: SnapshotData,
    options: AddSnapshotOptions,
  ): Promise<AddSnapshotOutcome> {
    return this.run("Error adding snapshot", () =>
      this.db
        .transaction((): AddSnapshotOutcome => {
          const row = this.requireClient(clientId);
          if (row.latest_version_id !== versionId) {
            return {
              status: "version-mismatch",
              latestVersionId: row.latest_version_id,
            };
          }

          this.statements.setSnapshot.run(
            versionId,
            Date.now(),
            toBuffer(data),
            clientId,
          );
          if (options.pruneVersions) {
            this.statements.pruneVersions.run(clientId, versionId);
          }

          return { status: "accepted", client: mapClient(this.requireClient(clientId)) };
        })
        .immediate(),
    );
  }

  async getSnapshot(clientId: ClientId): Promise<Snapshot | null> {
    return this.run("Error getting snapshot", () => {
      const row = this.statements.getSnapshot.get(clientId);
      if (!row?.snapshot || row.snapshot_version_id === null) return null;
      return {
        versionId: row.snapshot_version_id,
        data: new Uint8Array(row.snapshot),
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private requireClient(clientId: ClientId): ClientRow {
    const row = this.statements.getClient.get(clientId);
    if (!row) throw new NoSuchClientError(clientId);
    return row;
  }

  private run<T>(context: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStorageError(context, error);
    }
  }
}

function openDatabase(dataDir: string | undefined): DatabaseInstance {
  if (!dataDir) {
    throw new Error("SqliteStorage needs either a dataDir or a database");
  }
  mkdirSync(dataDir, { recursive: true });
  const db = new Database(join(dataDir, SQLITE_FILE_NAME));
  db.pragma("journal_mode = WAL");
  return db;
}

function initSchema(db: DatabaseInstance): void {
  db.pragma("foreign_keys = ON");
  db.exec(`
    CREATE TABLE IF NOT EXISTS clients (
      client_id TEXT PRIMARY KEY,
      latest_version_id TEXT NOT NULL DEFAULT '${NIL_VERSION_ID}',
      snapshot_version_id TEXT,
      versions_since_snapshot INTEGER NOT NULL DEFAULT 0,
      snapshot_timestamp INTEGER,
      snapshot BLOB
    )
  `);
  db.exec(`
    CREATE TABLE IF NOT EXISTS versions (
      client_id TEXT NOT NULL REFERENCES clients (client_id) ON DELETE CASCADE,
      version_id TEXT NOT NULL,
      parent_version_id TEXT NOT NULL,
      history_segment BLOB NOT NULL,
      PRIMARY KEY (client_id, version_id)
    )
  `);
  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS versions_by_parent
      ON versions (client_id, parent_version_id)
  `);
}

function mapClient(row: ClientRow): Client {
  return {
    clientId: row.client_id,
    latestVersionId: row.latest_version_id,
    snapshotVersionId: row.snapshot_version_id,
    versionsSinceSnapshot: row.versions_since_snapshot,
    snapshotTimestamp: row.snapshot_timestamp,
  };
}

function mapVersion(row: VersionRow): Version {
  return {
    versionId: row.version_id,
    parentVersionId: row.parent_version_id,
    historySegment: new Uint8Array(row.history_segment),
  };
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
