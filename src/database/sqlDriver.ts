import { ResultSet } from "../domain/resultSet";

export type DriverKind = "postgres" | "sqlite";

/**
 * Runs one statement and returns its fully fetched result.
 *
 * Implementations throw QueryError when the engine rejects the statement,
 * QueryTimeoutError when the engine cancels it for running too long, and
 * anything else when the database itself could not be used.
 */
export interface QueryExecutor {
  query(sql: string): Promise<ResultSet>;
}

/**
 * Administrative access to the grading schema. Only the schema manager is
 * handed this interface.
 */
export interface SchemaAdmin {
  dropAllObjects(): Promise<void>;
  runScript(script: string): Promise<void>;
}

export interface SqlDriver extends QueryExecutor, SchemaAdmin {
  readonly kind: DriverKind;
  connect(): Promise<void>;
  close(): Promise<void>;
}

/** Double-quote an identifier for either engine. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
