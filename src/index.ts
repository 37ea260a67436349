/**
 * drive-import – recreates exported folder/document trees in Google Drive.
 */
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import { readExportBundle, stageExportBundle } from "./bundle/reader.js";
import { parseConfig } from "./config.js";
import { toImportResult } from "./core/exceptions.js";
import { DriveImporter } from "./core/importer.js";
import { DRIVE_FOLDER_MAPPING } from "./core/mapping.js";
import { ImportResult, type ContainerResource, type JobResult, type TokensAndUrlAuthData } from "./core/types.js";
import { importTree } from "./core/walker.js";
import type { DatabaseBackend } from "./db/backend.js";
import type { StorageClient } from "./drive/client.js";
import { DriveCredentialFactory, type CredentialFactory } from "./drive/credentials.js";
import { DatabaseJobStore } from "./jobstore/database.js";
import { createLogger, silentLogger } from "./logger.js";
import type { StorageBackend } from "./storage/backend.js";

export * from "./core/types.js";
export * from "./core/exceptions.js";
export { DriveImporter, type Importer } from "./core/importer.js";
export { FolderImporter } from "./core/folders.js";
export { FileImporter, buildFileMetadata } from "./core/files.js";
export { importTree } from "./core/walker.js";
export { DRIVE_FOLDER_MAPPING, type DriveFolderMapping } from "./core/mapping.js";
export { DriveClient, type DriveFileMetadata, type StorageClient } from "./drive/client.js";
export { DriveCredentialFactory, type CredentialFactory } from "./drive/credentials.js";
export type { JobStore, DataType } from "./jobstore/backend.js";
export { DatabaseJobStore } from "./jobstore/database.js";

export interface DriveImportOptions {
  credentialFactory?: CredentialFactory;
  /** Use this client for every job instead of building one from credentials. */
  client?: StorageClient;
  reuseExistingFolders?: boolean;
  logger?: Logger;
}

export interface RunOptions {
  jobId?: string;
}

export class DriveImport {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private jobStore: DatabaseJobStore;
  private opts: DriveImportOptions;
  private log: Logger;

  constructor(storage: StorageBackend, db: DatabaseBackend, opts: DriveImportOptions = {}) {
    this.storage = storage;
    this.db = db;
    this.opts = opts;
    this.log = opts.logger ?? silentLogger;
    this.jobStore = new DatabaseJobStore(db, storage, this.log);
  }

  /** Construct from a configuration object (validates with Zod). */
  static async fromConfig(
    raw: unknown,
    overrides: Pick<DriveImportOptions, "credentialFactory" | "client"> = {},
  ): Promise<DriveImport> {
    const { config, storage, db } = parseConfig(raw);
    const ctx = new DriveImport(storage, db, {
      credentialFactory:
        overrides.credentialFactory ??
        new DriveCredentialFactory({
          apiBaseUrl: config.drive.apiBaseUrl,
          uploadBaseUrl: config.drive.uploadBaseUrl,
        }),
      client: overrides.client,
      reuseExistingFolders: config.import.reuseExistingFolders,
      logger: createLogger(config.log.level),
    });
    await ctx.initialize();
    return ctx;
  }

  /** Initialise the database (create tables). Call once after construction. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Import a whole tree as one job. Import failures are reported in the
   * result rather than thrown; folder mappings written before a failure
   * stay in place, so re-running with the same jobId resumes the job.
   */
  async runImport(
    authData: TokensAndUrlAuthData,
    tree: ContainerResource,
    opts: RunOptions = {},
  ): Promise<JobResult> {
    const jobId = opts.jobId ?? randomUUID();
    await this.upsertJob(jobId, "importing");

    // One importer per job, so each job builds its own client.
    const importer = new DriveImporter({
      credentialFactory: this.opts.credentialFactory ?? new DriveCredentialFactory(),
      jobStore: this.jobStore,
      client: this.opts.client,
      reuseExistingFolders: this.opts.reuseExistingFolders,
      logger: this.log,
    });

    let result: ImportResult = ImportResult.OK;
    let nodesImported = 0;
    try {
      nodesImported = await importTree(importer, jobId, authData, tree);
    } catch (err) {
      result = toImportResult(err);
      this.log.error({ jobId, err }, "import failed");
    }

    if (result.status === "ok") {
      await this.upsertJob(jobId, "completed");
    } else {
      await this.upsertJob(jobId, "failed", result.kind, result.message);
    }

    return {
      jobId,
      result,
      nodesImported,
      foldersMapped: await this.countMappings(jobId),
    };
  }

  /** Stage an export bundle's content, then import its tree. */
  async importBundle(
    authData: TokensAndUrlAuthData,
    zipPath: string,
    opts: RunOptions = {},
  ): Promise<JobResult> {
    const jobId = opts.jobId ?? randomUUID();
    const bundle = await readExportBundle(zipPath);
    const staged = await stageExportBundle(this.jobStore, jobId, bundle);
    this.log.info({ jobId, zipPath, staged }, "export bundle staged");
    return this.runImport(authData, bundle.root, { jobId });
  }

  /** Remove a job's mappings, staged content and status row. */
  async cleanupJob(jobId: string): Promise<void> {
    await this.jobStore.removeJob(jobId);
    await this.db.execute(`DELETE FROM jobs WHERE id = ?`, [jobId]);
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async upsertJob(
    jobId: string,
    status: string,
    errorKind: string | null = null,
    errorMessage: string | null = null,
  ): Promise<void> {
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO jobs (id, status, error_kind, error_message, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT (id)
       DO UPDATE SET status = excluded.status, error_kind = excluded.error_kind,
         error_message = excluded.error_message, updated_at = excluded.updated_at`,
      [jobId, status, errorKind, errorMessage, now, now],
    );
  }

  private async countMappings(jobId: string): Promise<number> {
    const row = await this.db.queryOne<{ n: number | string }>(
      `SELECT COUNT(*) AS n FROM job_data WHERE job_id = ? AND data_type = ?`,
      [jobId, DRIVE_FOLDER_MAPPING.name],
    );
    return Number(row?.n ?? 0);
  }

  // Expose for tests
  get _db(): DatabaseBackend {
    return this.db;
  }
  get _storage(): StorageBackend {
    return this.storage;
  }
  get _jobStore(): DatabaseJobStore {
    return this.jobStore;
  }
}
