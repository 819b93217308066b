import type { ServerConfig } from "../config";
import { InMemoryStorage } from "./memory";
import { PostgresStorage } from "./postgres";
import { SqliteStorage } from "./sqlite";
import type { Storage } from "./storage";

export type { AddSnapshotOptions, AddSnapshotOutcome, AddVersionOutcome, Storage } from "./storage";
export { InMemoryStorage } from "./memory";
export { PostgresStorage } from "./postgres";
export { SqliteStorage } from "./sqlite";

/** Open the backend named by the configuration; called once at startup. */
export function createStorage(
  config: Pick<ServerConfig, "storage" | "dataDir" | "databaseUrl">,
): Storage {
  switch (config.storage) {
    case "memory":
      return new InMemoryStorage();
    case "postgres":
      return new PostgresStorage({ connectionString: config.databaseUrl });
    case "sqlite":
      return new SqliteStorage({ dataDir: config.dataDir });
  }
}
