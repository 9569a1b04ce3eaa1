import fs from "fs";
import path from "path";
import { QuestionVerdict, StudentReport, formatScore } from "../domain/grading";
import { QueryOutcome, ResultSet, formatRow } from "../domain/resultSet";

/**
 * Where finished student reports go. The orchestrator calls `begin` once
 * the question list is known and `record` after each student.
 */
export interface ReportSink {
  begin(questionIndices: readonly number[]): void;
  record(report: StudentReport): void;
}

export interface ReportWriterOptions {
  resultsFile: string;
  logsDir: string;
}

const RULE = "=".repeat(60);

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function resultsHeader(questionIndices: readonly number[]): string[] {
  if (questionIndices.length === 1) {
    return ["StudentID", "Result"];
  }
  return ["StudentID", ...questionIndices.map((i) => `Q${i}`), "Total"];
}

export function resultsRow(report: StudentReport): string[] {
  const statuses = report.verdicts.map((v) => v.status);
  if (report.verdicts.length === 1) {
    return [report.studentId, ...statuses];
  }
  return [report.studentId, ...statuses, formatScore(report)];
}

function formatResultSet(result: ResultSet): string[] {
  const lines = [`Columns: ${result.columns.join(", ")}`, `Rows (${result.rows.length}):`];
  for (const row of result.rows) {
    lines.push(`  ${formatRow(row)}`);
  }
  return lines;
}

function formatActual(verdict: QuestionVerdict, actual: QueryOutcome | undefined): string[] {
  if (actual?.kind === "success") {
    return ["STUDENT OUTPUT:", ...formatResultSet(actual.result)];
  }
  if (actual?.kind === "error") {
    return ["SQL ERROR:", actual.message];
  }
  if (verdict.failure === "missing_answer") {
    return ["STUDENT OUTPUT:", "(no answer submitted)"];
  }
  return ["STUDENT OUTPUT:", "(not executed)"];
}

/**
 * Human-readable log for one student: a header, then one block per
 * question with the expected output, the student's output and the diff.
 */
export function formatStudentLog(report: StudentReport): string {
  const lines = [`STUDENT ID: ${report.studentId}`, `SCORE: ${formatScore(report)}`];

  for (const verdict of report.verdicts) {
    lines.push("", RULE, `QUESTION ${verdict.questionIndex}: ${verdict.status}`, RULE, "");

    lines.push("EXPECTED OUTPUT:");
    lines.push(...(verdict.expected ? formatResultSet(verdict.expected) : ["(not available)"]));
    lines.push("");
    lines.push(...formatActual(verdict, verdict.actual));

    if (verdict.diff) {
      lines.push("", "DIFF:", verdict.diff);
    }
    if (verdict.notes.length > 0) {
      lines.push("", "NOTES:", ...verdict.notes);
    }
  }

  return lines.join("\n") + "\n";
}

/**
 * ReportWriter keeps the results CSV and one log file per student.
 * Rows are appended as students finish, so an interrupted run still
 * leaves a valid table of the students that completed.
 */
export class ReportWriter implements ReportSink {
  constructor(private readonly options: ReportWriterOptions) {}

  begin(questionIndices: readonly number[]): void {
    const resultsDir = path.dirname(this.options.resultsFile);
    if (!fs.existsSync(resultsDir)) {
      fs.mkdirSync(resultsDir, { recursive: true });
    }
    if (!fs.existsSync(this.options.logsDir)) {
      fs.mkdirSync(this.options.logsDir, { recursive: true });
    }
    fs.writeFileSync(this.options.resultsFile, toCsvLine(resultsHeader(questionIndices)));
  }

  record(report: StudentReport): void {
    fs.appendFileSync(this.options.resultsFile, toCsvLine(resultsRow(report)));
    fs.writeFileSync(this.logPath(report.studentId), formatStudentLog(report));
  }

  logPath(studentId: string): string {
    return path.join(this.options.logsDir, `${studentId}.log`);
  }
}

function toCsvLine(fields: string[]): string {
  return fields.map(csvField).join(",") + "\n";
}
