/**
 * Authentication Middleware
 *
 * Validates client IDs against an optional allowlist.
 * If the allowlist is non-empty, only those clients can access the API.
 * Otherwise all clients are accepted (open mode).
 */

import type { Context, Next } from "hono";
import { Headers } from "../types";

/**
 * Normalize configured client IDs for case-insensitive lookups.
 */
export function parseAllowlist(allowedClientIds: Iterable<string>): Set<string> {
  return new Set(
    Array.from(allowedClientIds)
      .map((id) => id.trim().toLowerCase())
      .filter((id) => id.length > 0),
  );
}

/**
 * Middleware to enforce client ID allowlist.
 *
 * - If the allowlist is empty, all requests pass through
 * - Otherwise, only requests with X-Client-Id in the allowlist are allowed
 * - Returns 403 Forbidden for unauthorized clients
 */
export function clientAllowlist(allowedClientIds: Iterable<string>) {
  const allowlist = parseAllowlist(allowedClientIds);

  return async (c: Context, next: Next) => {
    if (allowlist.size === 0) return next();

    const clientId = c.req.header(Headers.CLIENT_ID);
    if (!clientId) return next(); // No client ID provided - let the handler deal with it (returns 400)

    if (!allowlist.has(clientId.toLowerCase())) {
      return c.text("Forbidden: Client ID not in allowlist", 403);
    }

    return next();
  };
}
