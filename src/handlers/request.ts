/**
 * Request parsing shared by the protocol handlers.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ClientId, VersionId } from "../types";
import { Headers, parseUuid } from "../types";

function badRequest(message: string): HTTPException {
  return new HTTPException(400, { message });
}

/** The X-Client-Id header, lower-cased; 400 when missing or not a UUID */
export function requireClientId(c: Context): ClientId {
  const header = c.req.header(Headers.CLIENT_ID);
  if (!header) {
    throw badRequest("Missing X-Client-Id header");
  }
  const clientId = parseUuid(header);
  if (!clientId) {
    throw badRequest("Invalid X-Client-Id header");
  }
  return clientId;
}

/** A version ID path parameter; 400 when missing or not a UUID */
export function requireVersionParam(c: Context, name: string): VersionId {
  const value = c.req.param(name);
  if (!value) {
    throw badRequest(`Missing ${name}`);
  }
  const versionId = parseUuid(value);
  if (!versionId) {
    throw badRequest(`Invalid ${name}`);
  }
  return versionId;
}

/**
 * The request body as bytes. A Content-Type other than `contentType` is
 * rejected, as is an empty body.
 */
export async function requireBody(
  c: Context,
  contentType: string,
  what: string,
): Promise<Uint8Array> {
  const header = c.req.header("Content-Type");
  if (header && !header.includes(contentType)) {
    throw badRequest("Invalid content type");
  }

  const body = new Uint8Array(await c.req.arrayBuffer());
  if (body.byteLength === 0) {
    throw badRequest(`Missing ${what}`);
  }
  return body;
}
