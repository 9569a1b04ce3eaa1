import { QuestionVerdict } from "./grading";
import { QueryOutcome, ResultSet, Row, formatRowSet, rowKey } from "./resultSet";

export interface RowDiff {
  missing: Row[]; // in expected, not in actual
  extra: Row[]; // in actual, not in expected
}

/**
 * Multiset difference in both directions. A row expected twice but
 * returned once appears once under `missing`.
 */
export function diffRows(expected: readonly Row[], actual: readonly Row[]): RowDiff {
  const counts = new Map<string, { row: Row; balance: number }>();

  for (const row of expected) {
    const key = rowKey(row);
    const entry = counts.get(key);
    if (entry) {
      entry.balance++;
    } else {
      counts.set(key, { row, balance: 1 });
    }
  }
  for (const row of actual) {
    const key = rowKey(row);
    const entry = counts.get(key);
    if (entry) {
      entry.balance--;
    } else {
      counts.set(key, { row, balance: -1 });
    }
  }

  const missing: Row[] = [];
  const extra: Row[] = [];
  for (const { row, balance } of counts.values()) {
    for (let i = 0; i < balance; i++) missing.push(row);
    for (let i = 0; i < -balance; i++) extra.push(row);
  }
  return { missing, extra };
}

function describeColumns(columns: readonly string[]): string {
  return `[${columns.join(", ")}]`;
}

/**
 * Compare a student's result set with the ground truth.
 *
 * Rows are authoritative: column names may differ (aliases, case) and are
 * only noted, but the column count must match.
 */
export function compareResults(
  questionIndex: number,
  expected: ResultSet,
  actual: ResultSet
): QuestionVerdict {
  const notes: string[] = [];
  const problems: string[] = [];
  const outcome: QueryOutcome = { kind: "success", result: actual };

  if (expected.columns.length !== actual.columns.length) {
    problems.push(
      `Column count mismatch: expected ${expected.columns.length} ${describeColumns(expected.columns)}, ` +
        `got ${actual.columns.length} ${describeColumns(actual.columns)}`
    );
  } else if (expected.columns.some((name, i) => name !== actual.columns[i])) {
    notes.push(
      `Column names differ: expected ${describeColumns(expected.columns)}, got ${describeColumns(actual.columns)}`
    );
  }

  const { missing, extra } = diffRows(expected.rows, actual.rows);
  if (missing.length > 0) {
    problems.push(`Missing rows: ${formatRowSet(missing)}`);
  }
  if (extra.length > 0) {
    problems.push(`Extra rows: ${formatRowSet(extra)}`);
  }

  if (problems.length === 0) {
    return { questionIndex, status: "PASS", notes, expected, actual: outcome };
  }
  return {
    questionIndex,
    status: "FAIL",
    failure: "mismatch",
    diff: problems.join("\n"),
    notes,
    expected,
    actual: outcome,
  };
}

/**
 * Grade one question. A failed execution is not compared at all; the
 * engine's message becomes the diff.
 */
export function judgeOutcome(
  questionIndex: number,
  expected: ResultSet,
  outcome: QueryOutcome
): QuestionVerdict {
  if (outcome.kind === "error") {
    return {
      questionIndex,
      status: "FAIL",
      failure: "execution_error",
      diff: outcome.message,
      notes: [],
      expected,
      actual: outcome,
    };
  }
  return compareResults(questionIndex, expected, outcome.result);
}
