/**
 * In-memory storage for tests and experimentation.
 *
 * Every operation runs to completion without yielding, so the check and the
 * write of `addVersion` / `addSnapshot` can never interleave with another
 * request on the same event loop. Not shared between processes.
 */

import { ClientAlreadyExistsError, NoSuchClientError } from "../errors";
import type {
  Client,
  ClientId,
  HistorySegment,
  Snapshot,
  SnapshotData,
  Version,
  VersionId,
} from "../types";
import {
  type AddSnapshotOptions,
  type AddSnapshotOutcome,
  type AddVersionOutcome,
  emptyClient,
  type Storage,
} from "./storage";

interface ClientState {
  client: Client;
  snapshot: SnapshotData | null;
  /** version_id -> version */
  versions: Map<VersionId, Version>;
  /** parent_version_id -> version_id */
  children: Map<VersionId, VersionId>;
}

export class InMemoryStorage implements Storage {
  private clients = new Map<ClientId, ClientState>();

  async getClient(clientId: ClientId): Promise<Client | null> {
    const state = this.clients.get(clientId);
    return state ? { ...state.client } : null;
  }

  async createClient(clientId: ClientId): Promise<Client> {
    if (this.clients.has(clientId)) {
      throw new ClientAlreadyExistsError(clientId);
    }
    const client = emptyClient(clientId);
    this.clients.set(clientId, {
      client,
      snapshot: null,
      versions: new Map(),
      children: new Map(),
    });
    return { ...client };
  }

  async getVersionByParent(
    clientId: ClientId,
    parentVersionId: VersionId,
  ): Promise<Version | null> {
    const state = this.clients.get(clientId);
    const versionId = state?.children.get(parentVersionId);
    if (!state || versionId === undefined) return null;
    return copyVersion(state.versions.get(versionId));
  }

  async addVersion(
    clientId: ClientId,
    parentVersionId: VersionId,
    newVersionId: VersionId,
    historySegment: HistorySegment,
  ): Promise<AddVersionOutcome> {
    const state = this.requireClient(clientId);
    const { client } = state;

    if (client.latestVersionId !== parentVersionId) {
      return { status: "conflict", latestVersionId: client.latestVersionId };
    }

    state.versions.set(newVersionId, {
      versionId: newVersionId,
      parentVersionId,
      historySegment: Uint8Array.from(historySegment),
    });
    state.children.set(parentVersionId, newVersionId);
    client.latestVersionId = newVersionId;
    client.versionsSinceSnapshot += 1;

    return { status: "committed", client: { ...client } };
  }

  async addSnapshot(
    clientId: ClientId,
    versionId: VersionId,
    data: SnapshotData,
    options: AddSnapshotOptions,
  ): Promise<AddSnapshotOutcome> {
    const state = this.requireClient(clientId);
    const { client } = state;

    if (client.latestVersionId !== versionId) {
      return {
        status: "version-mismatch",
        latestVersionId: client.latestVersionId,
      };
    }

    client.snapshotVersionId = versionId;
    client.snapshotTimestamp = Date.now();
    client.versionsSinceSnapshot = 0;
    state.snapshot = Uint8Array.from(data);

    if (options.pruneVersions) {
      const head = state.versions.get(versionId);
      state.versions.clear();
      state.children.clear();
      if (head) {
        state.versions.set(head.versionId, head);
        state.children.set(head.parentVersionId, head.versionId);
      }
    }

    return { status: "accepted", client: { ...client } };
  }

  async getSnapshot(clientId: ClientId): Promise<Snapshot | null> {
    const state = this.clients.get(clientId);
    if (!state?.snapshot || state.client.snapshotVersionId === null) {
      return null;
    }
    return {
      versionId: state.client.snapshotVersionId,
      data: Uint8Array.from(state.snapshot),
    };
  }

  async close(): Promise<void> {
    this.clients.clear();
  }

  private requireClient(clientId: ClientId): ClientState {
    const state = this.clients.get(clientId);
    if (!state) throw new NoSuchClientError(clientId);
    return state;
  }
}

function copyVersion(version: Version | undefined): Version | null {
  if (!version) return null;
  return { ...version, historySegment: Uint8Array.from(version.historySegment) };
}
