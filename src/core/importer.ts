/**
 * Import orchestrator: resolves the Drive parent of a container, then
 * creates its sub-folders and uploads its files under that parent.
 */
import type { Logger } from "pino";
import type { StorageClient } from "../drive/client.js";
import type { CredentialFactory } from "../drive/credentials.js";
import type { JobStore } from "../jobstore/backend.js";
import { silentLogger } from "../logger.js";
import { PreconditionFailedError } from "./exceptions.js";
import { FileImporter } from "./files.js";
import { FolderImporter } from "./folders.js";
import { DRIVE_FOLDER_MAPPING } from "./mapping.js";
import {
  ImportResult,
  MIGRATED_CONTENT_FOLDER,
  ROOT_SENTINEL,
  isRootResource,
  type ContainerResource,
  type TokensAndUrlAuthData,
} from "./types.js";

export interface Importer<A, T> {
  importItem(jobId: string, authData: A, data: T): Promise<ImportResult>;
}

export interface DriveImporterOptions {
  credentialFactory: CredentialFactory;
  jobStore: JobStore;
  /** Use this client instead of building one from the job credentials. */
  client?: StorageClient;
  reuseExistingFolders?: boolean;
  logger?: Logger;
}

export class DriveImporter implements Importer<TokensAndUrlAuthData, ContainerResource> {
  private credentialFactory: CredentialFactory;
  private jobStore: JobStore;
  private folders: FolderImporter;
  private files: FileImporter;
  private log: Logger;

  // Built once, on first use; read through getClient().
  private client: Promise<StorageClient> | null;

  constructor(opts: DriveImporterOptions) {
    this.credentialFactory = opts.credentialFactory;
    this.jobStore = opts.jobStore;
    this.client = opts.client ? Promise.resolve(opts.client) : null;
    const logger = opts.logger ?? silentLogger;
    this.log = logger.child({ component: "DriveImporter" });
    this.folders = new FolderImporter({
      jobStore: opts.jobStore,
      reuseExisting: opts.reuseExistingFolders,
      logger,
    });
    this.files = new FileImporter({ jobStore: opts.jobStore, logger });
  }

  async importItem(
    jobId: string,
    authData: TokensAndUrlAuthData,
    data: ContainerResource,
  ): Promise<ImportResult> {
    let parentId: string;

    if (isRootResource(data)) {
      const client = await this.getClient(authData);
      parentId = await this.folders.importFolder(
        jobId,
        client,
        MIGRATED_CONTENT_FOLDER,
        ROOT_SENTINEL,
        null,
      );
    } else {
      const mapping = await this.jobStore.findData(jobId, data.id, DRIVE_FOLDER_MAPPING);
      if (!mapping) {
        throw new PreconditionFailedError(`No mapping found for ${data.id}`);
      }
      parentId = mapping.newId;
      this.log.info(
        { jobId, parentId, oldId: data.id, name: data.name },
        "resolved parent folder",
      );
    }

    const client = await this.getClient(authData);

    // Sub-folders are mapped before any file of this container is uploaded.
    for (const folder of data.folders) {
      await this.folders.importFolder(jobId, client, folder.name, folder.id, parentId);
    }

    for (const file of data.files) {
      await this.files.importFile(jobId, client, file, parentId);
    }

    return ImportResult.OK;
  }

  private getClient(authData: TokensAndUrlAuthData): Promise<StorageClient> {
    if (!this.client) {
      const pending: Promise<StorageClient> = Promise.resolve()
        .then(() => this.credentialFactory.createClient(authData))
        .catch((err: unknown) => {
          // Let the next call try again
          if (this.client === pending) this.client = null;
          throw err;
        });
      this.client = pending;
    }
    return this.client;
  }
}
