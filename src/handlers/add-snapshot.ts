/**
 * POST /v1/client/add-snapshot/:versionId
 *
 * Store an encrypted snapshot at the client's latest version.
 *
 * Request:
 *   - Header: X-Client-Id (UUID)
 *   - Path: versionId (UUID of the version this snapshot represents)
 *   - Body: Snapshot data (binary)
 *   - Content-Type: application/vnd.taskchampion.snapshot
 *
 * Response:
 *   - 200 OK: Snapshot stored, or ignored because the version is not the head
 *   - 400 BAD REQUEST: Malformed client ID, version ID or body
 *
 * Even after a 200 OK the snapshot may not appear in a later GET snapshot.
 */

import type { Context } from "hono";
import type { SyncEngine } from "../engine";
import { ContentType } from "../types";
import { requireBody, requireClientId, requireVersionParam } from "./request";

export async function addSnapshot(
  c: Context,
  engine: SyncEngine,
): Promise<Response> {
  const clientId = requireClientId(c);
  const versionId = requireVersionParam(c, "versionId");
  const snapshotData = await requireBody(c, ContentType.SNAPSHOT, "snapshot data");

  // A rejected snapshot is logged by the engine; the replica carries on
  await engine.addSnapshot(clientId, versionId, snapshotData);

  return c.body(null, 200);
}
