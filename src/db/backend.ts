/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders — no ORM.
 */
export type SqlParam = string | number | null;

export interface DatabaseBackend {
  /** Create tables / indexes from schema.sql. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T | null>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
