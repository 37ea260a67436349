/**
 * Destination storage client: the StorageClient contract and its Google
 * Drive v3 REST implementation.
 */
import type { Readable } from "node:stream";
import { z } from "zod";
import { TransportError } from "../core/exceptions.js";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
export const GOOGLE_APPS_MIME_PREFIX = "application/vnd.google-apps.";

export const DEFAULT_API_BASE_URL = "https://www.googleapis.com/drive/v3";
export const DEFAULT_UPLOAD_BASE_URL = "https://www.googleapis.com/upload/drive/v3";

/** File metadata as the Drive `files` resource expects it. */
export interface DriveFileMetadata {
  name: string;
  parents?: string[];
  /** RFC 3339 */
  modifiedTime?: string;
  mimeType?: string;
}

export interface StorageClient {
  /** Create a folder under `parentId`, or at the root; returns its id. */
  createFolder(name: string, parentId?: string): Promise<string>;

  /** Create a file, streaming `content` as its body; returns its id. */
  createFile(metadata: DriveFileMetadata, content?: Readable): Promise<string>;
}

export interface DriveClientOptions {
  accessToken: string;
  apiBaseUrl?: string;
  uploadBaseUrl?: string;
  fetch?: typeof fetch;
}

const CreatedFileSchema = z.object({ id: z.string().min(1) });

export class DriveClient implements StorageClient {
  private accessToken: string;
  private apiBaseUrl: string;
  private uploadBaseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(opts: DriveClientOptions) {
    this.accessToken = opts.accessToken;
    this.apiBaseUrl = (opts.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, "");
    this.uploadBaseUrl = (opts.uploadBaseUrl ?? DEFAULT_UPLOAD_BASE_URL).replace(/\/$/, "");
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async createFolder(name: string, parentId?: string): Promise<string> {
    const metadata: DriveFileMetadata = { name, mimeType: FOLDER_MIME_TYPE };
    if (parentId) metadata.parents = [parentId];

    const res = await this.send(`${this.apiBaseUrl}/files?fields=id`, {
      method: "POST",
      headers: this.headers({ "Content-Type": "application/json; charset=UTF-8" }),
      body: JSON.stringify(metadata),
    });
    return this.readId(res);
  }

  /**
   * Resumable upload: the metadata POST opens a session, then the body is
   * streamed in one PUT without a known length.
   */
  async createFile(metadata: DriveFileMetadata, content?: Readable): Promise<string> {
    const session = await this.send(
      `${this.uploadBaseUrl}/files?uploadType=resumable&fields=id`,
      {
        method: "POST",
        headers: this.headers({ "Content-Type": "application/json; charset=UTF-8" }),
        body: JSON.stringify(metadata),
      },
    );
    const location = session.headers.get("location");
    if (!location) {
      throw new TransportError("upload session has no Location header", session.status);
    }
    await session.body?.cancel();

    const res = await this.send(location, {
      method: "PUT",
      headers: this.headers({ "Content-Type": "application/octet-stream" }),
      body: content ?? "",
      duplex: "half",
    });
    return this.readId(res);
  }

  private headers(extra: Record<string, string>): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}`, ...extra };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, init);
    } catch (err) {
      throw new TransportError(err instanceof Error ? err.message : String(err), null, {
        cause: err,
      });
    }
    if (!res.ok) {
      const detail = await res.text().catch(() => "");
      throw new TransportError(
        `${init.method ?? "GET"} ${url} ${res.statusText}${detail ? `: ${detail}` : ""}`,
        res.status,
      );
    }
    return res;
  }

  private async readId(res: Response): Promise<string> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new TransportError("response is not JSON", res.status, { cause: err });
    }
    const parsed = CreatedFileSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError("response carries no file id", res.status);
    }
    return parsed.data.id;
  }
}
