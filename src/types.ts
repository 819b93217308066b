/**
 * Sync Protocol Types
 *
 * Wire constants and the records shared by the engine, the storage
 * backends and the HTTP handlers.
 */

/** UUID identifying a client (shared across devices for the same user) */
export type ClientId = string;

/** UUID identifying a version in the version chain */
export type VersionId = string;

/** Encrypted history segment containing task changes */
export type HistorySegment = Uint8Array;

/** Encrypted snapshot of the full task database */
export type SnapshotData = Uint8Array;

/** Special version ID representing "no parent" (base of the chain) */
export const NIL_VERSION_ID: VersionId = "00000000-0000-0000-0000-000000000000";

/** Any RFC 4122 layout, including the nil UUID */
export const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Content types used by the protocol */
export const ContentType = {
  HISTORY_SEGMENT: "application/vnd.taskchampion.history-segment",
  SNAPSHOT: "application/vnd.taskchampion.snapshot",
} as const;

/** Custom headers used by the protocol */
export const Headers = {
  CLIENT_ID: "X-Client-Id",
  VERSION_ID: "X-Version-Id",
  PARENT_VERSION_ID: "X-Parent-Version-Id",
  SNAPSHOT_REQUEST: "X-Snapshot-Request",
} as const;

/** Snapshot urgency levels for X-Snapshot-Request header */
export type SnapshotUrgency = "none" | "low" | "high";

/** Client record, without the snapshot blob */
export interface Client {
  clientId: ClientId;
  /** Head of the chain, or NIL_VERSION_ID when the chain is empty */
  latestVersionId: VersionId;
  snapshotVersionId: VersionId | null;
  versionsSinceSnapshot: number;
  /** Epoch milliseconds */
  snapshotTimestamp: number | null;
}

/** Version record stored in the database */
export interface Version {
  versionId: VersionId;
  parentVersionId: VersionId;
  historySegment: HistorySegment;
}

/** Latest snapshot of a client */
export interface Snapshot {
  versionId: VersionId;
  data: SnapshotData;
}

/** Returns the lower-cased UUID, or undefined when `value` is not a UUID */
export function parseUuid(value: string | undefined): string | undefined {
  if (!value || !UUID_PATTERN.test(value)) return undefined;
  return value.toLowerCase();
}
