/**
 * File importer: streams one cached document into a Drive folder.
 */
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import {
  GOOGLE_APPS_MIME_PREFIX,
  type DriveFileMetadata,
  type StorageClient,
} from "../drive/client.js";
import type { JobStore } from "../jobstore/backend.js";
import { silentLogger } from "../logger.js";
import { ContentStreamError, ImportError, MetadataTranslationError } from "./exceptions.js";
import type { DocumentWrapper } from "./types.js";

const RFC3339_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(\.\d+)?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;
const RFC3339_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validate an RFC 3339 timestamp and return it in the form Drive accepts:
 * upper-case `T` and `Z` separators. A bare date is taken as midnight UTC.
 */
export function parseRfc3339(value: string): string {
  const dateTime = RFC3339_DATE_TIME.exec(value);
  const date = dateTime ?? RFC3339_DATE.exec(value);
  if (!date) {
    throw new MetadataTranslationError("dateModified", value);
  }

  const [year, month, day] = [Number(date[1]), Number(date[2]), Number(date[3])];
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
    throw new MetadataTranslationError("dateModified", value);
  }
  const ymd = `${date[1]}-${date[2]}-${date[3]}`;
  if (!dateTime) {
    return `${ymd}T00:00:00Z`;
  }

  const [, , , hh, mm, ss, fraction = "", zulu, sign, offH, offM] = dateTime;
  // Leap seconds are not representable in Drive's timestamps.
  if (Number(hh) > 23 || Number(mm) > 59 || Number(ss) > 59) {
    throw new MetadataTranslationError("dateModified", value);
  }
  if (!zulu && (Number(offH) > 23 || Number(offM) > 59)) {
    throw new MetadataTranslationError("dateModified", value);
  }
  const zone = zulu ? "Z" : `${sign}${offH}:${offM}`;
  return `${ymd}T${hh}:${mm}:${ss}${fraction}${zone}`;
}

export function buildFileMetadata(
  file: DocumentWrapper,
  parentId?: string | null,
): DriveFileMetadata {
  const doc = file.document;
  const metadata: DriveFileMetadata = { name: doc.name };
  if (parentId) {
    metadata.parents = [parentId];
  }
  if (doc.dateModified) {
    metadata.modifiedTime = parseRfc3339(doc.dateModified);
  }
  // Other mime types are left for Drive to infer from the content.
  const format = file.originalEncodingFormat;
  if (format && format.startsWith(GOOGLE_APPS_MIME_PREFIX)) {
    metadata.mimeType = format;
  }
  return metadata;
}

export interface FileImporterOptions {
  jobStore: JobStore;
  logger?: Logger;
}

export class FileImporter {
  private jobStore: JobStore;
  private log: Logger;

  constructor(opts: FileImporterOptions) {
    this.jobStore = opts.jobStore;
    this.log = (opts.logger ?? silentLogger).child({ component: "FileImporter" });
  }

  async importFile(
    jobId: string,
    client: StorageClient,
    file: DocumentWrapper,
    parentId?: string | null,
  ): Promise<void> {
    const content = await this.openContent(jobId, file.cachedContentId);
    const failure: { error?: Error } = {};
    const onError = (err: Error): void => {
      failure.error = err;
    };
    content.on("error", onError);

    try {
      const metadata = buildFileMetadata(file, parentId);
      await client.createFile(metadata, content);
      this.log.info(
        { jobId, name: metadata.name, parentId, contentRef: file.cachedContentId },
        "file uploaded",
      );
    } catch (err) {
      if (failure.error) {
        throw new ContentStreamError(failure.error.message, { cause: failure.error });
      }
      throw err;
    } finally {
      content.destroy();
    }
  }

  private async openContent(jobId: string, contentRef: string): Promise<Readable> {
    try {
      return await this.jobStore.getStream(jobId, contentRef);
    } catch (err) {
      if (err instanceof ImportError) throw err;
      throw new ContentStreamError(err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }
  }
}
