/**
 * GET /v1/client/get-child-version/:parentVersionId
 *
 * Get the child version of a given parent version.
 *
 * Request:
 *   - Header: X-Client-Id (UUID)
 *   - Path: parentVersionId (UUID, or nil UUID for first version)
 *
 * Response:
 *   - 200 OK: Version found
 *     - Header: X-Version-Id (the version's UUID)
 *     - Header: X-Parent-Version-Id (echoed back)
 *     - Body: History segment (binary)
 *     - Content-Type: application/vnd.taskchampion.history-segment
 *   - 404 NOT FOUND: No child version (client is up-to-date)
 *   - 410 GONE: Parent is unknown or was pruned (client should use snapshot)
 *   - 400 BAD REQUEST: Missing client ID
 */

import type { Context } from "hono";
import type { SyncEngine } from "../engine";
import { ContentType, Headers } from "../types";
import { requireClientId, requireVersionParam } from "./request";

export async function getChildVersion(
  c: Context,
  engine: SyncEngine,
): Promise<Response> {
  const clientId = requireClientId(c);
  const parentVersionId = requireVersionParam(c, "parentVersionId");

  const result = await engine.getChildVersion(clientId, parentVersionId);

  switch (result.status) {
    case "gone":
      return c.text("Version pruned", 410);
    case "not-found":
      return c.text("Up to date", 404);
    case "found":
      return new Response(result.historySegment, {
        status: 200,
        headers: {
          "Content-Type": ContentType.HISTORY_SEGMENT,
          [Headers.VERSION_ID]: result.versionId,
          [Headers.PARENT_VERSION_ID]: result.parentVersionId,
        },
      });
  }
}
