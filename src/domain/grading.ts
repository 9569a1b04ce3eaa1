import { QueryOutcome, ResultSet } from "./resultSet";

export type VerdictStatus = "PASS" | "FAIL";

export type FailureKind =
  | "mismatch"
  | "execution_error"
  | "missing_answer"
  | "format_error"
  | "infrastructure_error";

export interface QuestionVerdict {
  questionIndex: number;
  status: VerdictStatus;
  failure?: FailureKind;
  diff?: string; // why the question failed, shown verbatim in the log
  notes: string[]; // remarks that did not affect the verdict
  expected?: ResultSet;
  actual?: QueryOutcome;
}

export interface StudentReport {
  studentId: string;
  verdicts: QuestionVerdict[];
  passed: number;
  total: number;
}

export interface StudentScore {
  studentId: string;
  passed: number;
  total: number;
}

export interface RunSummary {
  studentsEvaluated: number;
  scores: StudentScore[];
  cancelled: boolean;
}

export function buildStudentReport(
  studentId: string,
  verdicts: QuestionVerdict[]
): StudentReport {
  const ordered = [...verdicts].sort((a, b) => a.questionIndex - b.questionIndex);
  return {
    studentId,
    verdicts: ordered,
    passed: ordered.filter((v) => v.status === "PASS").length,
    total: ordered.length,
  };
}

/**
 * Fail every question with the same reason. Used when a student's file
 * cannot be parsed or the schema could not be prepared for them.
 */
export function failAll(
  questionIndices: readonly number[],
  failure: FailureKind,
  diff: string
): QuestionVerdict[] {
  return questionIndices.map((questionIndex): QuestionVerdict => ({
    questionIndex,
    status: "FAIL",
    failure,
    diff,
    notes: [],
  }));
}

export function formatScore(score: { passed: number; total: number }): string {
  return `${score.passed}/${score.total}`;
}
