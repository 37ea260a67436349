/**
 * Import data model: the exported content tree and import outcomes.
 */

/** Source id of the top of an exported tree. */
export const ROOT_SENTINEL = "root";

/** Display name of the folder every job's content is placed under. */
export const MIGRATED_CONTENT_FOLDER = "MigratedContent";

/** Metadata of one exported document. */
export interface DigitalDocument {
  name: string;
  /** RFC 3339 timestamp text. */
  dateModified?: string | null;
  encodingFormat?: string | null;
}

/** One file to upload: a content handle plus its document metadata. */
export interface DocumentWrapper {
  cachedContentId: string;
  originalEncodingFormat?: string | null;
  document: DigitalDocument;
}

/** A folder in the exported tree together with its direct children. */
export interface ContainerResource {
  id: string;
  name: string;
  folders: ContainerResource[];
  files: DocumentWrapper[];
}

/** Destination credentials handed to the credential factory. */
export interface TokensAndUrlAuthData {
  accessToken: string;
  refreshToken?: string;
  tokenServerUrl?: string;
}

export type ImportErrorKind =
  | "precondition"
  | "transport"
  | "translation"
  | "content";

export type ImportResult =
  | { status: "ok" }
  | {
      status: "error";
      kind: ImportErrorKind;
      message: string;
      retryable: boolean;
    };

export const ImportResult: { readonly OK: ImportResult } = {
  OK: { status: "ok" },
};

/** Summary returned from DriveImport.runImport(). */
export interface JobResult {
  jobId: string;
  result: ImportResult;
  /** Containers whose importItem() call completed. */
  nodesImported: number;
  /** Folder mappings held for the job, the root folder included. */
  foldersMapped: number;
}

export function isRootResource(resource: Pick<ContainerResource, "id">): boolean {
  return !resource.id || resource.id === ROOT_SENTINEL;
}
