/**
 * Abstract storage backend interface.
 */
import type { Readable } from "node:stream";

export interface StorageBackend {
  /** Write data to the given key. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Open a readable stream for the given key. */
  readStream(key: string): Readable;

  /** List all keys with the given prefix. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Delete the given key, and every key beneath it. */
  delete(key: string): Promise<void>;
}
