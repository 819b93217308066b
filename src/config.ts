/**
 * Server configuration.
 *
 * Every setting can be given as a command-line flag or an environment
 * variable; the flag wins. The merged values are validated with zod.
 */

import { Command } from "commander";
import { z } from "zod";
import { ConfigError } from "./errors";
import { UUID_PATTERN } from "./types";

export interface ListenAddress {
  hostname: string;
  port: number;
}

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

function parseListenAddress(value: string, ctx: z.RefinementCtx): ListenAddress {
  const separator = value.lastIndexOf(":");
  const hostname = separator > 0 ? value.slice(0, separator) : "";
  const port = Number(value.slice(separator + 1));
  if (!hostname || !Number.isInteger(port) || port < 0 || port > 65535) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected HOST:PORT, got "${value}"`,
    });
    return z.NEVER;
  }
  // "[::1]:8080" binds the bare IPv6 address
  return { hostname: hostname.replace(/^\[(.*)\]$/, "$1"), port };
}

const ConfigSchema = z
  .object({
    listen: z
      .array(z.string().transform(parseListenAddress))
      .min(1)
      .default(["localhost:8080"]),
    storage: z.enum(["sqlite", "postgres", "memory"]).default("sqlite"),
    dataDir: z.string().min(1).default("./data"),
    databaseUrl: z.string().min(1).optional(),
    allowClientIds: z
      .array(
        z
          .string()
          .regex(UUID_PATTERN, "must be a UUID")
          .transform((id) => id.toLowerCase()),
      )
      .default([]),
    createClients: z.boolean().default(true),
    snapshotVersions: z.coerce.number().int().positive().default(100),
    snapshotDays: z.coerce.number().int().positive().default(14),
    versionRetention: z.enum(["keep-all", "prune-on-snapshot"]).default("keep-all"),
    maxBodyBytes: z.coerce
      .number()
      .int()
      .positive()
      .default(100 * 1024 * 1024),
    logLevel: z.enum(LOG_LEVELS).default("info"),
    logPretty: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.storage === "postgres" && !config.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["databaseUrl"],
        message: "is required when storage is postgres",
      });
    }
  });

export type ServerConfig = z.output<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function program(): Command {
  return new Command()
    .name("task-sync-server")
    .description("Sync server for encrypted task databases")
    .option("-l, --listen <address...>", "HOST:PORT to listen on [env: LISTEN]")
    .option("--storage <kind>", "sqlite, postgres or memory [env: STORAGE]")
    .option("-d, --data-dir <dir>", "directory for the SQLite database [env: DATA_DIR]")
    .option("--database-url <url>", "Postgres connection string [env: DATABASE_URL]")
    .option(
      "-C, --allow-client-id <id...>",
      "client IDs to allow; all clients when absent [env: ALLOWED_CLIENT_IDS]",
    )
    .option("--create-clients", "create unknown clients on first contact (default)")
    .option("--no-create-clients", "reject unknown clients [env: CREATE_CLIENTS=false]")
    .option("--snapshot-versions <n>", "target versions between snapshots [env: SNAPSHOT_VERSIONS]")
    .option("--snapshot-days <n>", "target days between snapshots [env: SNAPSHOT_DAYS]")
    .option(
      "--version-retention <policy>",
      "keep-all or prune-on-snapshot [env: VERSION_RETENTION]",
    )
    .option("--max-body-bytes <n>", "largest accepted request body [env: MAX_BODY_BYTES]")
    .option("--log-level <level>", "pino log level [env: LOG_LEVEL]")
    .option("--log-pretty", "human-readable logs [env: LOG_PRETTY]")
    // Parse errors are thrown as CommanderError and reported by the caller
    .exitOverride()
    .configureOutput({ writeErr: () => {} });
}

/** Comma-separated env values; blank entries are dropped */
function envList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Unrecognized text is passed through for zod to reject */
function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}

function flagList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.flatMap((item) => envList(String(item)) ?? []);
}

function flagString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function flagBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Build the configuration from user arguments (without the node and script
 * paths) and the environment. Throws `ConfigError` naming every bad field.
 */
export function loadConfig(argv: readonly string[], env: Env = process.env): ServerConfig {
  const command = program();
  command.parse([...argv], { from: "user" });
  const flags = command.opts();

  const result = ConfigSchema.safeParse({
    listen: flagList(flags.listen) ?? envList(env.LISTEN),
    storage: flagString(flags.storage) ?? env.STORAGE,
    dataDir: flagString(flags.dataDir) ?? env.DATA_DIR,
    databaseUrl: flagString(flags.databaseUrl) ?? env.DATABASE_URL,
    allowClientIds: flagList(flags.allowClientId) ?? envList(env.ALLOWED_CLIENT_IDS),
    createClients: flagBoolean(flags.createClients) ?? envBoolean(env.CREATE_CLIENTS),
    snapshotVersions: flagString(flags.snapshotVersions) ?? env.SNAPSHOT_VERSIONS,
    snapshotDays: flagString(flags.snapshotDays) ?? env.SNAPSHOT_DAYS,
    versionRetention: flagString(flags.versionRetention) ?? env.VERSION_RETENTION,
    maxBodyBytes: flagString(flags.maxBodyBytes) ?? env.MAX_BODY_BYTES,
    logLevel: flagString(flags.logLevel) ?? env.LOG_LEVEL,
    logPretty: flagBoolean(flags.logPretty) ?? envBoolean(env.LOG_PRETTY),
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
