import { QueryError, QueryTimeoutError } from "../domain/errors";
import { ResultSet, createResultSet } from "../domain/resultSet";
import { toScalar } from "./scalars";
import { HostFailure, HostOp, HostReply, SqliteHost } from "./sqliteHost";
import { SqlDriver, quoteIdentifier } from "./sqlDriver";

export interface SqliteDriverOptions {
  filename: string; // ":memory:" for a private database
  timeoutMs: number;
}

// Errors that mean the database file itself is unusable, not the statement.
const INFRASTRUCTURE_CODES = [
  "SQLITE_IOERR",
  "SQLITE_CANTOPEN",
  "SQLITE_CORRUPT",
  "SQLITE_FULL",
  "SQLITE_NOTADB",
  "SQLITE_READONLY",
];

const TIMEOUT_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED"];

interface JournalEntry {
  op: HostOp;
  sql: string;
}

/**
 * SQLite through better-sqlite3, running in a child process (see
 * SqliteHost). A statement that outlives the timeout is stopped by
 * killing the host; the database is then reopened and, when it only
 * lived in memory, rebuilt from the statements that changed it since the
 * last reset.
 *
 * Every reset starts a new connection, so pragmas, temporary objects and
 * open transactions never reach the next generation.
 */
export class SqliteDriver implements SqlDriver {
  readonly kind = "sqlite";
  private readonly host: SqliteHost;
  private connected = false;
  private journal: JournalEntry[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: SqliteDriverOptions) {
    this.host = new SqliteHost({ filename: options.filename, busyTimeoutMs: options.timeoutMs });
  }

  private get inMemory(): boolean {
    return this.options.filename === ":memory:" || this.options.filename === "";
  }

  connect(): Promise<void> {
    return this.serialize(async () => {
      if (!this.connected) {
        await this.host.start();
        this.connected = true;
      }
    });
  }

  close(): Promise<void> {
    return this.serialize(async () => {
      this.connected = false;
      this.journal = [];
      await this.host.stop("close");
    });
  }

  query(sql: string): Promise<ResultSet> {
    return this.serialize(async () => {
      this.requireConnected();
      return this.queryWithDeadline(sql);
    });
  }

  dropAllObjects(): Promise<void> {
    return this.serialize(async () => {
      this.requireConnected();
      await this.host.stop("close");
      await this.host.start();
      this.journal = [];
      if (!this.inMemory) {
        await this.dropStoredObjects();
      }
    });
  }

  runScript(script: string): Promise<void> {
    return this.serialize(async () => {
      this.requireConnected();
      await this.call("exec", script);
    });
  }

  private async queryWithDeadline(sql: string): Promise<ResultSet> {
    const request = this.host.request("query", sql);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.options.timeoutMs);
    });

    try {
      const reply = await Promise.race([request, deadline]);
      if (reply === "timeout") {
        // the killed host rejects the request; that is expected here
        request.catch(() => undefined);
        await this.restartAfterTimeout();
        throw new QueryTimeoutError(this.options.timeoutMs);
      }
      return this.accept("query", sql, reply);
    } finally {
      clearTimeout(timer);
    }
  }

  private async call(op: HostOp, sql: string): Promise<ResultSet> {
    return this.accept(op, sql, await this.host.request(op, sql));
  }

  private accept(op: HostOp, sql: string, reply: HostReply): ResultSet {
    if (!reply.ok) {
      throw classify(reply.error, this.options.timeoutMs);
    }
    if (!reply.reader) {
      this.journal.push({ op, sql });
    }
    return createResultSet(reply.columns, reply.rows.map((row) => row.map(toScalar)));
  }

  private async restartAfterTimeout(): Promise<void> {
    await this.host.stop("kill");
    await this.host.start();
    if (!this.inMemory) {
      return;
    }
    for (const entry of this.journal) {
      const reply = await this.host.request(entry.op, entry.sql);
      if (!reply.ok) {
        throw new Error(`Could not rebuild the database after a timeout: ${reply.error.message}`);
      }
    }
  }

  // A file database keeps its objects across connections.
  private async dropStoredObjects(): Promise<void> {
    const foreignKeys = (await this.call("query", "PRAGMA foreign_keys")).rows[0]?.[0];
    await this.call("exec", "PRAGMA foreign_keys = OFF");
    try {
      const objects = await this.call(
        "query",
        `SELECT type, name FROM sqlite_master
         WHERE type IN ('view', 'trigger', 'table') AND name NOT LIKE 'sqlite_%'
         ORDER BY CASE type WHEN 'view' THEN 0 WHEN 'trigger' THEN 1 ELSE 2 END, name`
      );
      for (const [type, name] of objects.rows) {
        if (typeof type === "string" && typeof name === "string") {
          await this.call("exec", `DROP ${type.toUpperCase()} IF EXISTS ${quoteIdentifier(name)}`);
        }
      }
    } finally {
      await this.call("exec", `PRAGMA foreign_keys = ${foreignKeys === 1 ? "ON" : "OFF"}`);
      this.journal = [];
    }
  }

  private requireConnected(): void {
    if (!this.connected) {
      throw new Error("SQLite database is not connected");
    }
  }

  // One request at a time: a query that timed out holds the queue until
  // the host is back.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function classify(failure: HostFailure, timeoutMs: number): Error {
  const code = failure.code;
  if (failure.name === "SqliteError" && code !== undefined) {
    if (TIMEOUT_CODES.some((prefix) => code.startsWith(prefix))) {
      return new QueryTimeoutError(timeoutMs);
    }
    if (INFRASTRUCTURE_CODES.some((prefix) => code.startsWith(prefix))) {
      return new Error(`${code}: ${failure.message}`);
    }
    return new QueryError(failure.message, code);
  }
  // better-sqlite3 rejects empty and multi-statement strings with a RangeError
  if (failure.name === "RangeError") {
    return new QueryError(failure.message);
  }
  return new Error(failure.message);
}
