/**
 * Folder importer: creates one Drive folder and records its id mapping.
 */
import type { Logger } from "pino";
import type { StorageClient } from "../drive/client.js";
import type { JobStore } from "../jobstore/backend.js";
import { silentLogger } from "../logger.js";
import { DRIVE_FOLDER_MAPPING } from "./mapping.js";

export interface FolderImporterOptions {
  jobStore: JobStore;
  /**
   * Return the mapped folder instead of creating a second one when the
   * source id was already imported in this job. Defaults to true.
   */
  reuseExisting?: boolean;
  logger?: Logger;
}

export class FolderImporter {
  private jobStore: JobStore;
  private reuseExisting: boolean;
  private log: Logger;

  constructor(opts: FolderImporterOptions) {
    this.jobStore = opts.jobStore;
    this.reuseExisting = opts.reuseExisting ?? true;
    this.log = (opts.logger ?? silentLogger).child({ component: "FolderImporter" });
  }

  async importFolder(
    jobId: string,
    client: StorageClient,
    name: string,
    sourceId: string,
    parentId?: string | null,
  ): Promise<string> {
    if (this.reuseExisting) {
      const existing = await this.jobStore.findData(jobId, sourceId, DRIVE_FOLDER_MAPPING);
      if (existing) {
        this.log.debug({ jobId, sourceId, newId: existing.newId }, "folder already imported");
        return existing.newId;
      }
    }

    const newId = await client.createFolder(name, parentId || undefined);
    await this.jobStore.update(jobId, sourceId, DRIVE_FOLDER_MAPPING, {
      oldId: sourceId,
      newId,
    });
    this.log.info({ jobId, sourceId, newId, name }, "folder created");
    return newId;
  }
}
