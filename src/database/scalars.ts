import { Scalar } from "../domain/resultSet";

/**
 * Convert whatever a driver hands back into a comparable scalar. Integers
 * stay exact: a bigint is narrowed to a number only when no precision is
 * lost.
 */
export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  // blobs: Buffer from pg, a plain byte array from the SQLite host
  if (ArrayBuffer.isView(value)) {
    return `\\x${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")}`;
  }
  return JSON.stringify(value);
}

/**
 * Decimal text (Postgres numeric and bigint columns) as a number, or a
 * bigint when an integer is too large to be exact. Text that is not a
 * plain decimal is returned unchanged.
 */
export function parseDecimal(text: string): Scalar {
  if (/^-?\d+$/.test(text)) {
    const asNumber = Number(text);
    return Number.isSafeInteger(asNumber) ? asNumber : BigInt(text);
  }
  if (/^-?\d*\.\d+(e[+-]?\d+)?$/i.test(text) || /^-?\d+(\.\d*)?e[+-]?\d+$/i.test(text)) {
    return Number(text);
  }
  return text;
}
