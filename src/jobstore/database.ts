/**
 * JobStore backed by a DatabaseBackend for records and a StorageBackend for
 * content blobs.
 */
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import type { DatabaseBackend } from "../db/backend.js";
import type { StorageBackend } from "../storage/backend.js";
import { ContentStreamError } from "../core/exceptions.js";
import { silentLogger } from "../logger.js";
import type { DataType, JobStore } from "./backend.js";

export class DatabaseJobStore implements JobStore {
  private db: DatabaseBackend;
  private storage: StorageBackend;
  private log: Logger;

  constructor(db: DatabaseBackend, storage: StorageBackend, logger: Logger = silentLogger) {
    this.db = db;
    this.storage = storage;
    this.log = logger.child({ component: "DatabaseJobStore" });
  }

  async findData<T>(jobId: string, key: string, type: DataType<T>): Promise<T | null> {
    const row = await this.db.queryOne<{ payload: string }>(
      `SELECT payload FROM job_data WHERE job_id = ? AND data_type = ? AND data_key = ?`,
      [jobId, type.name, key],
    );
    if (!row) return null;
    return type.schema.parse(JSON.parse(row.payload));
  }

  async update<T>(jobId: string, key: string, type: DataType<T>, data: T): Promise<void> {
    const payload = JSON.stringify(type.schema.parse(data));
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO job_data (job_id, data_type, data_key, payload, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT (job_id, data_type, data_key)
       DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`,
      [jobId, type.name, key, payload, now, now],
    );
    this.log.debug({ jobId, type: type.name, key }, "job data updated");
  }

  async getStream(jobId: string, contentRef: string): Promise<Readable> {
    const key = contentKey(jobId, contentRef);
    if (!(await this.storage.exists(key))) {
      throw new ContentStreamError(`no cached content ${contentRef} for job ${jobId}`);
    }
    return this.storage.readStream(key);
  }

  /** Stage a content blob so a later import can stream it. */
  async putContent(jobId: string, contentRef: string, data: Uint8Array | string): Promise<void> {
    await this.storage.write(contentKey(jobId, contentRef), data);
  }

  /** Delete every record and content blob of the job. */
  async removeJob(jobId: string): Promise<void> {
    await this.db.execute(`DELETE FROM job_data WHERE job_id = ?`, [jobId]);
    const keys = await this.storage.list(`${jobId}/content`);
    await this.storage.delete(jobId);
    this.log.info({ jobId, blobs: keys.length }, "job data removed");
  }
}

function contentKey(jobId: string, contentRef: string): string {
  return `${jobId}/content/${contentRef}`;
}
