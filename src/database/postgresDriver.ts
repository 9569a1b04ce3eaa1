import { Client, DatabaseError, FieldDef } from "pg";
import { QueryError, QueryTimeoutError } from "../domain/errors";
import { ResultSet, Scalar, createResultSet } from "../domain/resultSet";
import { parseDecimal, toScalar } from "./scalars";
import { SqlDriver, quoteIdentifier } from "./sqlDriver";

export interface PostgresDriverOptions {
  connectionString: string;
  schema: string;
  timeoutMs: number;
}

// pg hands these back as text to avoid precision loss
const INT8_OID = 20;
const NUMERIC_OID = 1700;

const QUERY_CANCELED = "57014";

/**
 * PostgreSQL through node-postgres, on a single client so that the
 * search_path set after each reset applies to every student query.
 */
export class PostgresDriver implements SqlDriver {
  readonly kind = "postgres";
  private client: Client | null = null;

  constructor(private readonly options: PostgresDriverOptions) {}

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }
    const client = new Client({ connectionString: this.options.connectionString });
    await client.connect();
    await client.query(this.timeoutStatement());
    this.client = client;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
    }
  }

  async query(sql: string): Promise<ResultSet> {
    const client = this.requireClient();
    try {
      const result = await client.query({ text: sql, rowMode: "array" });
      if (Array.isArray(result)) {
        throw new QueryError("Only one statement may be submitted per question.");
      }
      const fields: FieldDef[] = result.fields ?? [];
      const rows: unknown[][] = result.rows ?? [];
      return createResultSet(
        fields.map((f) => f.name),
        rows.map((row) => row.map((value, i) => convert(value, fields[i])))
      );
    } catch (error) {
      throw classify(error, this.options.timeoutMs);
    }
  }

  /**
   * Put the session back to how connect() left it, then recreate the
   * schema. Dropping the schema with CASCADE takes its tables, views,
   * sequences and functions with it.
   */
  async dropAllObjects(): Promise<void> {
    const client = this.requireClient();
    const schema = quoteIdentifier(this.options.schema);
    // an open or aborted transaction would make every later statement fail
    await client.query("ROLLBACK");
    await client.query("DISCARD ALL");
    await client.query(this.timeoutStatement());
    await client.query(`DROP SCHEMA IF EXISTS ${schema} CASCADE`);
    await client.query(`CREATE SCHEMA ${schema}`);
    await client.query(`SET search_path TO ${schema}`);
  }

  async runScript(script: string): Promise<void> {
    await this.requireClient().query(script);
  }

  private timeoutStatement(): string {
    return `SET statement_timeout = ${Math.max(1, Math.floor(this.options.timeoutMs))}`;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error("PostgreSQL client is not connected");
    }
    return this.client;
  }
}

function convert(value: unknown, field: FieldDef | undefined): Scalar {
  if (typeof value === "string" && (field?.dataTypeID === INT8_OID || field?.dataTypeID === NUMERIC_OID)) {
    return parseDecimal(value);
  }
  return toScalar(value);
}

function classify(error: unknown, timeoutMs: number): unknown {
  if (error instanceof QueryError) {
    return error;
  }
  if (error instanceof DatabaseError) {
    if (error.code === QUERY_CANCELED) {
      return new QueryTimeoutError(timeoutMs);
    }
    // class 08 is connection trouble, 57P is the server going away
    if (error.code?.startsWith("08") || error.code?.startsWith("57P")) {
      return error;
    }
    return new QueryError(error.message, error.code);
  }
  return error;
}
