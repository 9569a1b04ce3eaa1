export type Scalar = string | number | bigint | boolean | null;

export type Row = readonly Scalar[];

/**
 * A fully materialised query result. Column names keep the case the
 * engine reported; row order is whatever the engine returned and carries
 * no meaning for grading.
 */
export interface ResultSet {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export type QueryOutcome =
  | { kind: "success"; result: ResultSet }
  | { kind: "error"; message: string };

export function createResultSet(columns: string[], rows: Scalar[][]): ResultSet {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows.map((row) => Object.freeze([...row]))),
  });
}

export function success(result: ResultSet): QueryOutcome {
  return { kind: "success", result };
}

export function failure(message: string): QueryOutcome {
  return { kind: "error", message };
}

/**
 * Canonical text for one value. Numbers are keyed by value, so 98, 98n
 * and 98.0 share a key while "98" (a string) does not.
 */
export function scalarKey(value: Scalar): string {
  if (value === null) {
    return "z";
  }
  switch (typeof value) {
    case "bigint":
      return `n:${value.toString()}`;
    case "number":
      if (Number.isInteger(value)) {
        return `n:${BigInt(value).toString()}`;
      }
      return `n:${String(value)}`;
    case "boolean":
      return `b:${value}`;
    default:
      return `s:${JSON.stringify(value)}`;
  }
}

export function rowKey(row: Row): string {
  return row.map(scalarKey).join("|");
}

/** Render a value the way it would be written as a SQL literal. */
export function formatScalar(value: Scalar): string {
  if (value === null) {
    return "NULL";
  }
  if (typeof value === "string") {
    return `'${value.replace(/'/g, "''")}'`;
  }
  return String(value);
}

export function formatRow(row: Row): string {
  return `(${row.map(formatScalar).join(",")})`;
}

export function formatRowSet(rows: readonly Row[]): string {
  return `{${rows.map(formatRow).join(", ")}}`;
}
