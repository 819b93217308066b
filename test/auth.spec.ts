import { describe, expect, it } from "vitest";
import { SyncEngine } from "../src/engine";
import { createApp } from "../src/index";
import { parseAllowlist } from "../src/middleware/auth";
import { InMemoryStorage } from "../src/storage";
import { ContentType, Headers, NIL_VERSION_ID } from "../src/types";

const ALLOWED_CLIENT = "aaaaaaaa-aaaa-aaaa-aaaa-aaaaaaaaaaaa";
const BLOCKED_CLIENT = "bbbbbbbb-bbbb-bbbb-bbbb-bbbbbbbbbbbb";

/**
 * Create a test app with the given allowlist.
 */
function createTestApp(allowClientIds: string[]) {
  const engine = new SyncEngine({ storage: new InMemoryStorage() });
  const app = createApp({ engine, allowClientIds });

  return (clientId?: string) => {
    const headers: Record<string, string> = {
      "Content-Type": ContentType.HISTORY_SEGMENT,
    };
    if (clientId !== undefined) headers[Headers.CLIENT_ID] = clientId;

    return app.request(`/v1/client/add-version/${NIL_VERSION_ID}`, {
      method: "POST",
      headers,
      body: new Uint8Array([1, 2, 3]),
    });
  };
}

describe("Client ID Allowlist", () => {
  describe("when an allowlist is configured", () => {
    it("allows requests from clients in the allowlist", async () => {
      const addVersion = createTestApp([ALLOWED_CLIENT]);

      const response = await addVersion(ALLOWED_CLIENT);

      // Should succeed (200) not forbidden (403)
      expect(response.status).toBe(200);
    });

    it("blocks requests from clients not in the allowlist", async () => {
      const addVersion = createTestApp([ALLOWED_CLIENT]);

      const response = await addVersion(BLOCKED_CLIENT);

      expect(response.status).toBe(403);
      expect(await response.text()).toBe("Forbidden: Client ID not in allowlist");
    });

    it("supports multiple client IDs in allowlist", async () => {
      const anotherAllowed = "cccccccc-cccc-cccc-cccc-cccccccccccc";
      const addVersion = createTestApp([ALLOWED_CLIENT, anotherAllowed]);

      expect((await addVersion(ALLOWED_CLIENT)).status).toBe(200);
      expect((await addVersion(anotherAllowed)).status).toBe(200);
      // Blocked client should still be blocked
      expect((await addVersion(BLOCKED_CLIENT)).status).toBe(403);
    });

    it("is case-insensitive for client IDs", async () => {
      const addVersion = createTestApp([ALLOWED_CLIENT.toLowerCase()]);

      const response = await addVersion(ALLOWED_CLIENT.toUpperCase());

      expect(response.status).toBe(200);
    });

    it("passes through requests without client ID for handler to reject", async () => {
      const addVersion = createTestApp([ALLOWED_CLIENT]);

      const response = await addVersion();

      // Should be 400 (from handler), not 403 (from middleware)
      expect(response.status).toBe(400);
    });

    it("does not guard the health check", async () => {
      const engine = new SyncEngine({ storage: new InMemoryStorage() });
      const app = createApp({ engine, allowClientIds: [ALLOWED_CLIENT] });

      const response = await app.request("/", {
        headers: { [Headers.CLIENT_ID]: BLOCKED_CLIENT },
      });

      expect(response.status).toBe(200);
    });
  });

  describe("when the allowlist is empty", () => {
    it("allows any client ID (open mode)", async () => {
      const addVersion = createTestApp([]);

      const response = await addVersion("dddddddd-dddd-dddd-dddd-dddddddddddd");

      expect(response.status).toBe(200);
    });
  });

  describe("parseAllowlist", () => {
    it("trims, lower-cases and drops blank entries", () => {
      const allowlist = parseAllowlist([` ${ALLOWED_CLIENT.toUpperCase()} `, "", "  "]);

      expect([...allowlist]).toEqual([ALLOWED_CLIENT]);
    });
  });
});
