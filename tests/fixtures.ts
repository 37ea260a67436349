/**
 * Shared test fixtures: temp dirs, an in-process Drive stand-in, tree builders.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Readable } from "node:stream";
import { zipSync, strToU8 } from "fflate";

import type { ContainerResource, DocumentWrapper, TokensAndUrlAuthData } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { DriveFileMetadata, StorageClient } from "../src/drive/client.js";
import { DatabaseJobStore } from "../src/jobstore/database.js";
import { DiskStorage } from "../src/storage/disk.js";

export const AUTH: TokensAndUrlAuthData = { accessToken: "test-token" };

// ---------------------------------------------------------------------------
// Temp dir + backends
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "drive-import-test-"));
}

export async function makeJobStore(dir: string = makeTmpDir()) {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  const storage = new DiskStorage(join(dir, "storage"));
  const store = new DatabaseJobStore(db, storage);
  return { db, storage, store };
}

// ---------------------------------------------------------------------------
// Fake Drive
// ---------------------------------------------------------------------------

export interface CreatedFolder {
  id: string;
  name: string;
  parentId?: string;
}

export interface CreatedFile {
  id: string;
  metadata: DriveFileMetadata;
  content: string | null;
}

/** Records every call; ids are handed out as folder-1, file-1, ... */
export class FakeStorageClient implements StorageClient {
  folders: CreatedFolder[] = [];
  files: CreatedFile[] = [];
  /** "folder:<name>" / "file:<name>" in call order */
  calls: string[] = [];
  failOn: Set<string> = new Set();

  async createFolder(name: string, parentId?: string): Promise<string> {
    this.calls.push(`folder:${name}`);
    if (this.failOn.has(name)) throw new Error(`refused ${name}`);
    const id = `folder-${this.folders.length + 1}`;
    this.folders.push({ id, name, parentId });
    return id;
  }

  async createFile(metadata: DriveFileMetadata, content?: Readable): Promise<string> {
    this.calls.push(`file:${metadata.name}`);
    if (this.failOn.has(metadata.name)) throw new Error(`refused ${metadata.name}`);
    let body: string | null = null;
    if (content) {
      const chunks: Buffer[] = [];
      for await (const chunk of content) {
        chunks.push(Buffer.from(chunk));
      }
      body = Buffer.concat(chunks).toString("utf8");
    }
    const id = `file-${this.files.length + 1}`;
    this.files.push({ id, metadata, content: body });
    return id;
  }
}

// ---------------------------------------------------------------------------
// Tree builders
// ---------------------------------------------------------------------------

export function folder(
  id: string,
  name: string,
  children: { folders?: ContainerResource[]; files?: DocumentWrapper[] } = {},
): ContainerResource {
  return { id, name, folders: children.folders ?? [], files: children.files ?? [] };
}

export function doc(
  cachedContentId: string,
  name: string,
  extra: { dateModified?: string; originalEncodingFormat?: string } = {},
): DocumentWrapper {
  return {
    cachedContentId,
    originalEncodingFormat: extra.originalEncodingFormat,
    document: { name, dateModified: extra.dateModified },
  };
}

// ---------------------------------------------------------------------------
// Zip builder helper
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}
