/**
 * Error types raised by the engine and the storage backends.
 *
 * Conflicts and stale snapshots are not errors: they come back as typed
 * results (see engine.ts and storage/storage.ts).
 */

import type { ClientId } from "./types";

export class SyncServerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No client with the given ID, and the caller may not create it. */
export class NoSuchClientError extends SyncServerError {
  constructor(readonly clientId: ClientId) {
    super(`No such client: ${clientId}`);
  }
}

/** `createClient` lost a race with another request for the same client. */
export class ClientAlreadyExistsError extends SyncServerError {
  constructor(readonly clientId: ClientId) {
    super(`Client ${clientId} already exists`);
  }
}

/** The backend failed; the transaction was rolled back. */
export class StorageError extends SyncServerError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** Wraps anything thrown by a driver, leaving our own errors untouched. */
export function toStorageError(context: string, error: unknown): SyncServerError {
  if (error instanceof SyncServerError) return error;
  return new StorageError(context, error);
}

/** Startup configuration could not be parsed. */
export class ConfigError extends SyncServerError {}
