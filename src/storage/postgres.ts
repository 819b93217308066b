/**
 * Postgres Storage Backend
 *
 * Client/server store for deployments running several server processes
 * against one database. The check-then-write operations lock the client row
 * with `SELECT ... FOR UPDATE`, so concurrent requests for one client queue
 * behind each other while other clients proceed in parallel.
 *
 * The schema lives in `schema/postgres.sql` and must be applied beforehand.
 * External applications may insert `clients` rows with default values, or
 * delete them (versions cascade).
 */

import { Pool, type QueryResult } from "pg";
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
import {
  type AddSnapshotOptions,
  type AddSnapshotOutcome,
  type AddVersionOutcome,
  emptyClient,
  type Storage,
} from "./storage";

/** The part of a pooled `pg` connection this backend uses */
export interface PgConnection {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  release(err?: Error | boolean): void;
}

/** The part of `pg.Pool` this backend uses */
export interface PgPool {
  connect(): Promise<PgConnection>;
  end(): Promise<void>;
}

export interface PostgresStorageConfig {
  connectionString?: string;
  /** Use an existing pool instead of `connectionString` */
  pool?: PgPool;
  poolMax?: number;
  connectionTimeoutMs?: number;
  idleTimeoutMs?: number;
  /** 0 disables the server-side statement timeout */
  statementTimeoutMs?: number;
}

interface ClientRow {
  client_id: string;
  latest_version_id: string;
  snapshot_version_id: string | null;
  versions_since_snapshot: number;
  snapshot_timestamp: string | number | null;
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

const CLIENT_COLUMNS = `client_id, latest_version_id, snapshot_version_id,
  versions_since_snapshot, snapshot_timestamp`;

export class PostgresStorage implements Storage {
  private readonly pool: PgPool;

  constructor(config: PostgresStorageConfig) {
    this.pool = config.pool ?? createPool(config);
  }

  async getClient(clientId: ClientId): Promise<Client | null> {
    return this.withConnection("error getting client", async (db) => {
      const row = firstRow<ClientRow>(
        await db.query(`SELECT ${CLIENT_COLUMNS} FROM clients WHERE client_id = $1`, [
          clientId,
        ]),
      );
      return row ? mapClient(row) : null;
    });
  }

  async createClient(clientId: ClientId): Promise<Client> {
    return this.withConnection("error creating client", async (db) => {
      const inserted = await db.query(
        `INSERT INTO clients (client_id) VALUES ($1)
         ON CONFLICT (client_id) DO NOTHING
         RETURNING client_id`,
        [clientId],
      );
      if (!inserted.rows.length) throw new ClientAlreadyExistsError(clientId);
      return emptyClient(clientId);
    });
  }

  async getVersionByParent(
    clientId: ClientId,
    parentVersionId: VersionId,
  ): Promise<Version | null> {
    return this.withConnection("error getting version", async (db) => {
      const row = firstRow<VersionRow>(
        await db.query(
          `SELECT version_id, parent_version_id, history_segment
             FROM versions
            WHERE client_id = $1 AND parent_version_id = $2`,
          [clientId, parentVersionId],
        ),
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
    return this.transaction("error adding version", async (db) => {
      const current = await lockClient(db, clientId);
      if (current.latest_version_id !== parentVersionId) {
        return { status: "conflict", latestVersionId: current.latest_version_id };
      }

      await db.query(
        `INSERT INTO versions (client_id, version_id, parent_version_id, history_segment)
         VALUES ($1, $2, $3, $4)`,
        [clientId, newVersionId, parentVersionId, toBuffer(historySegment)],
      );
      const updated = firstRow<ClientRow>(
        await db.query(
          `UPDATE clients
              SET latest_version_id = $1,
                  versions_since_snapshot = versions_since_snapshot + 1
            WHERE client_id = $2
        RETURNING ${CLIENT_COLUMNS}`,
          [newVersionId, clientId],
        ),
      );
      if (!updated) throw new NoSuchClientError(clientId);

      return { status: "committed", client: mapClient(updated) };
    });
  }

  async addSnapshot(
    clientId: ClientId,
    versionId: VersionId,
    data: SnapshotData,
    options: AddSnapshotOptions,
  ): Promise<AddSnapshotOutcome> {
    return this.transaction("error setting snapshot", async (db) => {
      const current = await lockClient(db, clientId);
      if (current.latest_version_id !== versionId) {
        return {
          status: "version-mismatch",
          latestVersionId: current.latest_version_id,
        };
      }

      const updated = firstRow<ClientRow>(
        await db.query(
          `UPDATE clients
              SET snapshot_version_id = $1,
                  snapshot_timestamp = $2,
                  versions_since_snapshot = 0,
                  snapshot = $3
            WHERE client_id = $4
        RETURNING ${CLIENT_COLUMNS}`,
          [versionId, Date.now(), toBuffer(data), clientId],
        ),
      );
      if (!updated) throw new NoSuchClientError(clientId);

      if (options.pruneVersions) {
        await db.query(
          "DELETE FROM versions WHERE client_id = $1 AND version_id <> $2",
          [clientId, versionId],
        );
      }

      return { status: "accepted", client: mapClient(updated) };
    });
  }

  async getSnapshot(clientId: ClientId): Promise<Snapshot | null> {
    return this.withConnection("error getting snapshot data", async (db) => {
      const row = firstRow<SnapshotRow>(
        await db.query(
          "SELECT snapshot_version_id, snapshot FROM clients WHERE client_id = $1",
          [clientId],
        ),
      );
      if (!row?.snapshot || row.snapshot_version_id === null) return null;
      return {
        versionId: row.snapshot_version_id,
        data: new Uint8Array(row.snapshot),
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /** Check out one connection for the duration of `fn`. */
  private async withConnection<T>(
    context: string,
    fn: (db: PgConnection) => Promise<T>,
  ): Promise<T> {
    let db: PgConnection;
    try {
      db = await this.pool.connect();
    } catch (error) {
      throw toStorageError("error connecting to database", error);
    }

    try {
      return await fn(db);
    } catch (error) {
      throw toStorageError(context, error);
    } finally {
      db.release();
    }
  }

  /**
   * Run `fn` between BEGIN and COMMIT. Any failure rolls back; a connection
   * whose ROLLBACK also failed is destroyed rather than returned to the pool.
   */
  private async transaction<T>(
    context: string,
    fn: (db: PgConnection) => Promise<T>,
  ): Promise<T> {
    let db: PgConnection;
    try {
      db = await this.pool.connect();
    } catch (error) {
      throw toStorageError("error connecting to database", error);
    }

    let releaseError: Error | undefined;
    try {
      await db.query("BEGIN");
      const result = await fn(db);
      await db.query("COMMIT");
      return result;
    } catch (error) {
      releaseError = await rollback(db);
      throw toStorageError(context, error);
    } finally {
      db.release(releaseError);
    }
  }
}

function createPool(config: PostgresStorageConfig): PgPool {
  if (!config.connectionString) {
    throw new Error("PostgresStorage needs either a connectionString or a pool");
  }

  const statementTimeout = config.statementTimeoutMs ?? 30_000;
  return new Pool({
    connectionString: config.connectionString,
    max: config.poolMax ?? 10,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? 5_000,
    idleTimeoutMillis: config.idleTimeoutMs ?? 30_000,
    options:
      statementTimeout > 0
        ? `-c statement_timeout=${statementTimeout}`
        : undefined,
  });
}

async function lockClient(db: PgConnection, clientId: ClientId): Promise<ClientRow> {
  const row = firstRow<ClientRow>(
    await db.query(
      `SELECT ${CLIENT_COLUMNS} FROM clients WHERE client_id = $1 FOR UPDATE`,
      [clientId],
    ),
  );
  if (!row) throw new NoSuchClientError(clientId);
  return row;
}

/** Returns the error to release the connection with, if ROLLBACK failed */
async function rollback(db: PgConnection): Promise<Error | undefined> {
  try {
    await db.query("ROLLBACK");
    return undefined;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

function firstRow<T>(result: QueryResult): T | undefined {
  return result.rows[0];
}

function mapClient(row: ClientRow): Client {
  return {
    clientId: row.client_id,
    latestVersionId: row.latest_version_id,
    snapshotVersionId: row.snapshot_version_id,
    versionsSinceSnapshot: row.versions_since_snapshot,
    // BIGINT arrives as a string
    snapshotTimestamp:
      row.snapshot_timestamp === null ? null : Number(row.snapshot_timestamp),
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
