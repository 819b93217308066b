/**
 * POST /v1/client/add-version/:parentVersionId
 *
 * Append a history segment to the client's chain, provided the replica
 * built it on the current head.
 *
 * Request:
 *   - Header: X-Client-Id (UUID)
 *   - Path: parentVersionId (the replica's head, nil for an empty chain)
 *   - Body: History segment (binary, application/vnd.taskchampion.history-segment)
 *
 * Response:
 *   - 200 OK with X-Version-Id, plus X-Snapshot-Request (urgency=low|high)
 *     when the server wants a snapshot
 *   - 409 CONFLICT with X-Parent-Version-Id naming the actual head
 *   - 400 BAD REQUEST: malformed IDs, wrong content type or empty body
 *   - 403 FORBIDDEN: unknown client while client creation is disabled
 */

import type { Context } from "hono";
import type { SyncEngine } from "../engine";
import { ContentType, Headers } from "../types";
import { requireBody, requireClientId, requireVersionParam } from "./request";

export async function addVersion(c: Context, engine: SyncEngine): Promise<Response> {
  const clientId = requireClientId(c);
  const parentVersionId = requireVersionParam(c, "parentVersionId");
  const segment = await requireBody(c, ContentType.HISTORY_SEGMENT, "history segment");

  const result = await engine.addVersion(clientId, parentVersionId, segment);

  if (result.status === "conflict") {
    c.header(Headers.PARENT_VERSION_ID, result.latestVersionId);
    return c.body(null, 409);
  }

  c.header(Headers.VERSION_ID, result.versionId);
  if (result.snapshotRequested) {
    c.header(Headers.SNAPSHOT_REQUEST, `urgency=${result.snapshotUrgency}`);
  }
  return c.body(null, 200);
}
