import { describe, expect, it } from "vitest";
import { DEFAULT_SNAPSHOT_POLICY, snapshotUrgency, urgencyFor } from "../src/snapshot-policy";
import type { Client } from "../src/types";
import { NIL_VERSION_ID } from "../src/types";

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.UTC(2024, 0, 31);

function client(overrides: Partial<Client> = {}): Client {
  return {
    clientId: "11111111-1111-1111-1111-111111111111",
    latestVersionId: NIL_VERSION_ID,
    snapshotVersionId: null,
    versionsSinceSnapshot: 0,
    snapshotTimestamp: null,
    ...overrides,
  };
}

describe("urgencyFor", () => {
  it("is low from the target and high from one and a half times it", () => {
    expect(urgencyFor(99, 100)).toBe("none");
    expect(urgencyFor(100, 100)).toBe("low");
    expect(urgencyFor(149, 100)).toBe("low");
    expect(urgencyFor(150, 100)).toBe("high");
  });

  it("rounds the high threshold down", () => {
    expect(urgencyFor(9, 7)).toBe("low");
    expect(urgencyFor(10, 7)).toBe("high");
  });
});

describe("snapshotUrgency", () => {
  it("uses the defaults of 100 versions and 14 days", () => {
    expect(DEFAULT_SNAPSHOT_POLICY).toEqual({ versions: 100, days: 14 });
  });

  it("counts versions when no snapshot exists yet", () => {
    const policy = DEFAULT_SNAPSHOT_POLICY;

    expect(snapshotUrgency(client({ versionsSinceSnapshot: 1 }), policy, NOW)).toBe("none");
    expect(snapshotUrgency(client({ versionsSinceSnapshot: 100 }), policy, NOW)).toBe("low");
    expect(snapshotUrgency(client({ versionsSinceSnapshot: 150 }), policy, NOW)).toBe("high");
  });

  it("counts whole days since the snapshot", () => {
    const policy = DEFAULT_SNAPSHOT_POLICY;
    const at = (age: number) =>
      snapshotUrgency(
        client({ versionsSinceSnapshot: 1, snapshotTimestamp: NOW - age }),
        policy,
        NOW,
      );

    expect(at(14 * DAY_MS - 1)).toBe("none");
    expect(at(14 * DAY_MS)).toBe("low");
    expect(at(21 * DAY_MS)).toBe("high");
  });

  it("takes the more urgent of the two measures", () => {
    const policy = { versions: 10, days: 10 };

    expect(
      snapshotUrgency(
        client({ versionsSinceSnapshot: 15, snapshotTimestamp: NOW - 10 * DAY_MS }),
        policy,
        NOW,
      ),
    ).toBe("high");
    expect(
      snapshotUrgency(
        client({ versionsSinceSnapshot: 10, snapshotTimestamp: NOW - 30 * DAY_MS }),
        policy,
        NOW,
      ),
    ).toBe("high");
    expect(
      snapshotUrgency(client({ versionsSinceSnapshot: 1, snapshotTimestamp: NOW }), policy, NOW),
    ).toBe("none");
  });
});
