import type { Client, SnapshotUrgency } from "./types";

/** When to ask replicas for a snapshot */
export interface SnapshotPolicy {
  /** Target number of versions between snapshots */
  versions: number;
  /** Target number of days between snapshots */
  days: number;
}

export const DEFAULT_SNAPSHOT_POLICY: SnapshotPolicy = {
  versions: 100,
  days: 14,
};

const DAY_MS = 24 * 60 * 60 * 1000;

const RANK: Record<SnapshotUrgency, number> = { none: 0, low: 1, high: 2 };

/**
 * `low` once `value` reaches the target, `high` at one and a half times it.
 */
export function urgencyFor(value: number, target: number): SnapshotUrgency {
  if (value >= Math.floor((target * 3) / 2)) return "high";
  if (value >= target) return "low";
  return "none";
}

/**
 * Urgency after a version was added. The version count only resets when a
 * snapshot is accepted, so the request repeats on every call until then.
 * Snapshot age only counts once a snapshot exists.
 */
export function snapshotUrgency(
  client: Client,
  policy: SnapshotPolicy,
  now: number = Date.now(),
): SnapshotUrgency {
  const byVersions = urgencyFor(client.versionsSinceSnapshot, policy.versions);
  if (client.snapshotTimestamp === null) return byVersions;

  const days = Math.floor((now - client.snapshotTimestamp) / DAY_MS);
  const byAge = urgencyFor(days, policy.days);
  return RANK[byAge] > RANK[byVersions] ? byAge : byVersions;
}
