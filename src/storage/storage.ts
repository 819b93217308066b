/**
 * Storage Contract
 *
 * Every backend implements these operations, each as a single atomic
 * transaction. `addVersion` and `addSnapshot` are check-then-write: the
 * check and the write must be serializable against concurrent calls for the
 * same client, across every process sharing the backend. Different clients
 * need no isolation from each other.
 *
 * Backends throw `NoSuchClientError` when a write targets a missing client,
 * `ClientAlreadyExistsError` from `createClient`, and `StorageError` for any
 * driver failure. A thrown operation has no visible effect.
 */

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

export type AddVersionOutcome =
  | { status: "committed"; client: Client }
  | { status: "conflict"; latestVersionId: VersionId };

export type AddSnapshotOutcome =
  | { status: "accepted"; client: Client }
  | { status: "version-mismatch"; latestVersionId: VersionId };

export interface AddSnapshotOptions {
  /** Delete the versions covered by the snapshot in the same transaction */
  pruneVersions: boolean;
}

export interface Storage {
  getClient(clientId: ClientId): Promise<Client | null>;

  /** Insert a client with a nil head and no snapshot. */
  createClient(clientId: ClientId): Promise<Client>;

  /** The single version (if any) extending `parentVersionId`. */
  getVersionByParent(
    clientId: ClientId,
    parentVersionId: VersionId,
  ): Promise<Version | null>;

  /**
   * Append `newVersionId` if the head is still `parentVersionId`, bumping
   * `versionsSinceSnapshot`. Otherwise report the actual head.
   */
  addVersion(
    clientId: ClientId,
    parentVersionId: VersionId,
    newVersionId: VersionId,
    historySegment: HistorySegment,
  ): Promise<AddVersionOutcome>;

  /**
   * Store the snapshot if `versionId` is the head, resetting
   * `versionsSinceSnapshot`. Otherwise nothing changes.
   */
  addSnapshot(
    clientId: ClientId,
    versionId: VersionId,
    data: SnapshotData,
    options: AddSnapshotOptions,
  ): Promise<AddSnapshotOutcome>;

  getSnapshot(clientId: ClientId): Promise<Snapshot | null>;

  close(): Promise<void>;
}

/** The record `createClient` inserts */
export function emptyClient(clientId: ClientId): Client {
  return {
    clientId,
    latestVersionId: NIL_VERSION_ID,
    snapshotVersionId: null,
    versionsSinceSnapshot: 0,
    snapshotTimestamp: null,
  };
}
