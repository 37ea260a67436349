/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DEFAULT_API_BASE_URL, DEFAULT_UPLOAD_BASE_URL } from "./drive/client.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.literal("disk").default("disk"),
  config: z
    .object({ basePath: z.string().min(1).default("./data") })
    .default({}),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("sqlite"),
    config: z.object({ path: z.string().min(1).default(":memory:") }).default({}),
  }),
  z.object({
    provider: z.literal("postgres"),
    config: z.object({ connectionString: z.string().min(1) }),
  }),
]);

const DriveConfigSchema = z.object({
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  uploadBaseUrl: z.string().url().default(DEFAULT_UPLOAD_BASE_URL),
});

const ImportConfigSchema = z.object({
  reuseExistingFolders: z.boolean().default(true),
});

const LogConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  db: DbConfigSchema.default({ provider: "sqlite" }),
  drive: DriveConfigSchema.default({}),
  import: ImportConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildStorage(config: Config["storage"]): StorageBackend {
  return new DiskStorage(config.config.basePath);
}

function buildDb(config: Config["db"]): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function loadConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function parseConfig(raw: unknown): {
  config: Config;
  storage: StorageBackend;
  db: DatabaseBackend;
} {
  const config = loadConfig(raw);
  return { config, storage: buildStorage(config.storage), db: buildDb(config.db) };
}
