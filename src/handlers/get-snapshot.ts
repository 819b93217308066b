/**
 * GET /v1/client/snapshot
 *
 * Fetch the client's latest snapshot so a new or pruned replica can start
 * from it instead of replaying the whole chain.
 *
 * Response:
 *   - 200 OK: snapshot bytes (application/vnd.taskchampion.snapshot), with
 *     X-Version-Id naming the version it captures
 *   - 404 NOT FOUND: no snapshot yet
 *   - 400 BAD REQUEST: missing or malformed X-Client-Id
 */

import type { Context } from "hono";
import type { SyncEngine } from "../engine";
import { ContentType, Headers } from "../types";
import { requireClientId } from "./request";

export async function getSnapshot(c: Context, engine: SyncEngine): Promise<Response> {
  const result = await engine.getSnapshot(requireClientId(c));

  switch (result.status) {
    case "not-found":
      return c.text("No snapshot available", 404);
    case "found":
      return new Response(result.data, {
        status: 200,
        headers: {
          "Content-Type": ContentType.SNAPSHOT,
          [Headers.VERSION_ID]: result.versionId,
        },
      });
  }
}
