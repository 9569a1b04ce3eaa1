import { DatabaseConfig } from "../config";
import { PostgresDriver } from "./postgresDriver";
import { SqliteDriver } from "./sqliteDriver";
import { SqlDriver } from "./sqlDriver";

export function createDriver(database: DatabaseConfig, timeoutMs: number): SqlDriver {
  if (database.driver === "postgres") {
    return new PostgresDriver({
      connectionString: database.connectionString,
      schema: database.schema,
      timeoutMs,
    });
  }
  return new SqliteDriver({ filename: database.filename, timeoutMs });
}
