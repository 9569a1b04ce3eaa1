import { ChildProcess, spawn } from "child_process";

export type HostOp = "query" | "exec";

export interface HostFailure {
  name: string;
  code?: string;
  message: string;
}

export type HostReply =
  | { id: number; ok: true; reader: boolean; columns: string[]; rows: unknown[][] }
  | { id: number; ok: false; error: HostFailure };

export interface SqliteHostOptions {
  filename: string;
  busyTimeoutMs: number;
}

type StopMode = "close" | "kill";

interface Pending {
  resolve(reply: HostReply): void;
  reject(error: Error): void;
}

const HOST_ENV = "SQL_GRADER_SQLITE_HOST";
const READY_ID = 0;

// Runs under `node -e`. better-sqlite3 executes a statement in one native
// call that nothing inside the process can interrupt, so the connection
// lives in its own process and a runaway statement is stopped by killing it.
const HOST_SOURCE = `
const { modulePath, filename, busyTimeoutMs } = JSON.parse(process.env.${HOST_ENV});
const toFailure = (error) => ({ name: error.name, code: error.code, message: error.message });
const done = (id) => ({ id, ok: true, reader: false, columns: [], rows: [] });
let db = null;
try {
  const Database = require(modulePath);
  db = new Database(filename, { timeout: busyTimeoutMs });
  process.send(done(${READY_ID}));
} catch (error) {
  process.send({ id: ${READY_ID}, ok: false, error: toFailure(error) });
}
process.on("message", ({ id, op, sql }) => {
  try {
    if (op === "exec") {
      db.exec(sql);
      process.send(done(id));
      return;
    }
    const statement = db.prepare(sql);
    if (!statement.reader) {
      statement.run();
      process.send(done(id));
      return;
    }
    statement.safeIntegers(true);
    const columns = statement.columns().map((c) => c.name);
    process.send({ id, ok: true, reader: true, columns, rows: statement.raw(true).all() });
  } catch (error) {
    process.send({ id, ok: false, error: toFailure(error) });
  }
});
process.on("disconnect", () => {
  if (db) db.close();
  process.exit(0);
});
`;

/**
 * A child process that owns one better-sqlite3 connection and answers
 * requests over IPC. Rows cross the channel with structured cloning, so
 * 64-bit integers arrive as bigint and blobs as byte arrays.
 */
export class SqliteHost {
  private child: ChildProcess | null = null;
  private nextId = READY_ID + 1;
  private readonly pending = new Map<number, Pending>();

  constructor(private readonly options: SqliteHostOptions) {}

  get running(): boolean {
    return this.child !== null;
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }

    const child = spawn(process.execPath, ["-e", HOST_SOURCE], {
      stdio: ["ignore", "inherit", "inherit", "ipc"],
      serialization: "advanced",
      env: {
        ...process.env,
        [HOST_ENV]: JSON.stringify({
          modulePath: require.resolve("better-sqlite3"),
          filename: this.options.filename,
          busyTimeoutMs: this.options.busyTimeoutMs,
        }),
      },
    });
    this.child = child;
    const ready = this.register(READY_ID);

    child.on("message", (message) => {
      if (child === this.child) {
        this.settle(message);
      }
    });
    child.once("error", (error) => this.abandon(child, error));
    child.once("exit", (code, signal) =>
      this.abandon(child, new Error(`SQLite host exited (${signal ?? `code ${code}`})`))
    );

    const reply = await ready;
    if (!reply.ok) {
      await this.stop("kill");
      throw new Error(`Could not open SQLite database ${this.options.filename}: ${reply.error.message}`);
    }
  }

  request(op: HostOp, sql: string): Promise<HostReply> {
    const child = this.child;
    if (!child) {
      return Promise.reject(new Error("SQLite host is not running"));
    }
    const id = this.nextId++;
    const reply = this.register(id);
    child.send({ id, op, sql }, (error) => {
      if (error) {
        this.abandon(child, error);
      }
    });
    return reply;
  }

  /**
   * "close" lets the host close the database and exit; "kill" stops it
   * wherever it is, mid-statement included.
   */
  async stop(mode: StopMode): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    const exited = new Promise<void>((resolve) => child.once("exit", () => resolve()));
    if (mode === "kill" || !child.connected) {
      child.kill("SIGKILL");
    } else {
      child.disconnect();
    }
    await exited;
  }

  private register(id: number): Promise<HostReply> {
    return new Promise<HostReply>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
  }

  private settle(message: unknown): void {
    const reply = readReply(message);
    if (!reply) {
      return;
    }
    const waiter = this.pending.get(reply.id);
    this.pending.delete(reply.id);
    waiter?.resolve(reply);
  }

  private abandon(child: ChildProcess, error: Error): void {
    if (child !== this.child) {
      return;
    }
    this.child = null;
    for (const waiter of this.pending.values()) {
      waiter.reject(error);
    }
    this.pending.clear();
  }
}

function readReply(message: unknown): HostReply | null {
  if (typeof message !== "object" || message === null || !("id" in message) || !("ok" in message)) {
    return null;
  }
  const id = message.id;
  if (typeof id !== "number") {
    return null;
  }

  if (message.ok === true) {
    const columns = "columns" in message && Array.isArray(message.columns) ? message.columns : [];
    const rows = "rows" in message && Array.isArray(message.rows) ? message.rows : [];
    return {
      id,
      ok: true,
      reader: "reader" in message && message.reader === true,
      columns: columns.filter((c): c is string => typeof c === "string"),
      rows: rows.filter((row): row is unknown[] => Array.isArray(row)),
    };
  }

  return { id, ok: false, error: readFailure("error" in message ? message.error : undefined) };
}

function readFailure(value: unknown): HostFailure {
  if (typeof value !== "object" || value === null) {
    return { name: "Error", message: String(value) };
  }
  const name = "name" in value && typeof value.name === "string" ? value.name : "Error";
  const message = "message" in value && typeof value.message === "string" ? value.message : "unknown error";
  const code = "code" in value && typeof value.code === "string" ? value.code : undefined;
  return code === undefined ? { name, message } : { name, code, message };
}
