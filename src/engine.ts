/**
 * Sync Protocol Engine
 *
 * Stateless: every operation reads and writes through the storage contract,
 * and each storage call is its own transaction. The engine never retries. A
 * conflict is the authoritative answer for the client, which has to merge
 * locally and resubmit against the new head.
 */

import { randomUUID } from "node:crypto";
import { ClientAlreadyExistsError, NoSuchClientError } from "./errors";
import { type Logger, silentLogger } from "./logger";
import {
  DEFAULT_SNAPSHOT_POLICY,
  type SnapshotPolicy,
  snapshotUrgency,
} from "./snapshot-policy";
import type { Storage } from "./storage/storage";
import type {
  Client,
  ClientId,
  HistorySegment,
  SnapshotData,
  SnapshotUrgency,
  VersionId,
} from "./types";
import { NIL_VERSION_ID } from "./types";

/** What happens to versions already covered by an accepted snapshot */
export type VersionRetention = "keep-all" | "prune-on-snapshot";

export interface SyncEngineOptions {
  storage: Storage;
  snapshotPolicy?: Partial<SnapshotPolicy>;
  /** Create unknown clients on first contact (default true) */
  createClients?: boolean;
  versionRetention?: VersionRetention;
  logger?: Logger;
  /** Clock used for snapshot age */
  now?: () => number;
}

export type GetChildVersionResult =
  | {
      status: "found";
      versionId: VersionId;
      parentVersionId: VersionId;
      historySegment: HistorySegment;
    }
  /** No child yet: the caller is up to date */
  | { status: "not-found" }
  /** The parent is unknown or was pruned: the caller should use the snapshot */
  | { status: "gone" };

export type AddVersionResult =
  | {
      status: "ok";
      versionId: VersionId;
      snapshotUrgency: SnapshotUrgency;
      snapshotRequested: boolean;
    }
  | { status: "conflict"; latestVersionId: VersionId };

export type AddSnapshotResult =
  | { status: "accepted" }
  | { status: "rejected"; latestVersionId: VersionId };

export type GetSnapshotResult =
  | { status: "found"; versionId: VersionId; data: SnapshotData }
  | { status: "not-found" };

export class SyncEngine {
  readonly storage: Storage;
  readonly snapshotPolicy: SnapshotPolicy;
  readonly createClients: boolean;
  readonly versionRetention: VersionRetention;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: SyncEngineOptions) {
    this.storage = options.storage;
    this.snapshotPolicy = {
      versions: options.snapshotPolicy?.versions ?? DEFAULT_SNAPSHOT_POLICY.versions,
      days: options.snapshotPolicy?.days ?? DEFAULT_SNAPSHOT_POLICY.days,
    };
    this.createClients = options.createClients ?? true;
    this.versionRetention = options.versionRetention ?? "keep-all";
    this.logger = (options.logger ?? silentLogger).child({ module: "engine" });
    this.now = options.now ?? Date.now;
  }

  async getChildVersion(
    clientId: ClientId,
    parentVersionId: VersionId,
  ): Promise<GetChildVersionResult> {
    // Read the client before the version: a child committed in between is
    // then found, never misreported as gone.
    const client = await this.ensureClient(clientId);
    const version = await this.storage.getVersionByParent(clientId, parentVersionId);

    if (version) {
      return {
        status: "found",
        versionId: version.versionId,
        parentVersionId: version.parentVersionId,
        historySegment: version.historySegment,
      };
    }

    // An add-version with this parent would succeed, so there is simply
    // nothing newer yet.
    if (
      client.latestVersionId === parentVersionId ||
      client.latestVersionId === NIL_VERSION_ID
    ) {
      return { status: "not-found" };
    }
    return { status: "gone" };
  }

  async addVersion(
    clientId: ClientId,
    parentVersionId: VersionId,
    historySegment: HistorySegment,
  ): Promise<AddVersionResult> {
    await this.ensureClient(clientId);

    const versionId = randomUUID();
    const outcome = await this.storage.addVersion(
      clientId,
      parentVersionId,
      versionId,
      historySegment,
    );

    if (outcome.status === "conflict") {
      this.logger.debug(
        { clientId, parentVersionId, latestVersionId: outcome.latestVersionId },
        "add_version rejected: parent is not the latest version",
      );
      return { status: "conflict", latestVersionId: outcome.latestVersionId };
    }

    const urgency = snapshotUrgency(outcome.client, this.snapshotPolicy, this.now());
    this.logger.debug(
      { clientId, parentVersionId, versionId, snapshotUrgency: urgency },
      "add_version accepted",
    );
    return {
      status: "ok",
      versionId,
      snapshotUrgency: urgency,
      snapshotRequested: urgency !== "none",
    };
  }

  async addSnapshot(
    clientId: ClientId,
    versionId: VersionId,
    data: SnapshotData,
  ): Promise<AddSnapshotResult> {
    const client = await this.ensureClient(clientId);

    if (versionId === NIL_VERSION_ID) {
      this.logger.debug({ clientId }, "rejecting snapshot for the nil version");
      return { status: "rejected", latestVersionId: client.latestVersionId };
    }

    const outcome = await this.storage.addSnapshot(clientId, versionId, data, {
      pruneVersions: this.versionRetention === "prune-on-snapshot",
    });

    if (outcome.status === "version-mismatch") {
      this.logger.debug(
        { clientId, versionId, latestVersionId: outcome.latestVersionId },
        "rejecting snapshot: version is not the latest version",
      );
      return { status: "rejected", latestVersionId: outcome.latestVersionId };
    }

    this.logger.debug({ clientId, versionId }, "accepted snapshot");
    return { status: "accepted" };
  }

  /** Never creates the client: there is nothing to return for a new one. */
  async getSnapshot(clientId: ClientId): Promise<GetSnapshotResult> {
    const client = await this.storage.getClient(clientId);
    if (!client) {
      if (!this.createClients) throw new NoSuchClientError(clientId);
      return { status: "not-found" };
    }

    const snapshot = await this.storage.getSnapshot(clientId);
    if (!snapshot) return { status: "not-found" };
    return { status: "found", versionId: snapshot.versionId, data: snapshot.data };
  }

  /**
   * Fetch the client, creating it when policy allows. A concurrent request
   * may create it first, in which case that row is used.
   */
  private async ensureClient(clientId: ClientId): Promise<Client> {
    const existing = await this.storage.getClient(clientId);
    if (existing) return existing;

    if (!this.createClients) throw new NoSuchClientError(clientId);

    try {
      const created = await this.storage.createClient(clientId);
      this.logger.info({ clientId }, "created client");
      return created;
    } catch (error) {
      if (!(error instanceof ClientAlreadyExistsError)) throw error;
      const raced = await this.storage.getClient(clientId);
      if (!raced) throw error;
      return raced;
    }
  }
}
