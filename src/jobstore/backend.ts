/**
 * Job store interface: per-job keyed data plus cached content blobs.
 */
import type { Readable } from "node:stream";
import type { z } from "zod";

/**
 * Names a kind of record kept in the job store and the schema its stored
 * JSON must satisfy when read back.
 */
export interface DataType<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

export function defineDataType<T>(name: string, schema: z.ZodType<T>): DataType<T> {
  return { name, schema };
}

export interface JobStore {
  /** Look up the record stored under `key` for the job, or null. */
  findData<T>(jobId: string, key: string, type: DataType<T>): Promise<T | null>;

  /** Create or replace the record stored under `key` for the job. */
  update<T>(jobId: string, key: string, type: DataType<T>, data: T): Promise<void>;

  /** Open the cached content blob `contentRef` of the job. */
  getStream(jobId: string, contentRef: string): Promise<Readable>;
}
