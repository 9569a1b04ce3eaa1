import path from "path";
import { isBlankSql, parseQuerySet, scanMarkers } from "./markerParser";

export type CheckStatus = "PASS" | "WARNING" | "FAIL";

export interface QuestionCheck {
  index: number;
  status: CheckStatus;
  message: string;
}

export interface FormatCheckReport {
  fileName: string;
  fileNameValid: boolean;
  studentId: string | null;
  questions: QuestionCheck[];
  fileError: string | null; // why the grader would reject the whole file
  passed: boolean;
}

export interface FormatCheckOptions {
  expectedCount: number;
  studentIdPattern: RegExp;
}

// e.g. 2023A7PS0043H.sql
export const DEFAULT_STUDENT_ID_PATTERN = /^\d{4}[A-Z0-9]{4}\d{4}[A-Z]\.sql$/i;

export function isValidStudentFileName(fileName: string, pattern: RegExp): boolean {
  return pattern.test(path.basename(fileName));
}

/**
 * Student identifier for a submission file: the base name without ".sql",
 * upper-cased.
 */
export function studentIdFromFileName(fileName: string): string {
  return path.basename(fileName).replace(/\.sql$/i, "").toUpperCase();
}

/**
 * Check a file before it is submitted: the file name must be a student ID,
 * every expected marker must be present with a query after it, and the
 * grader must be able to split the file. A missing terminator is only a
 * warning; the grader does not need it.
 */
export function checkSubmissionFormat(
  fileName: string,
  content: string,
  options: FormatCheckOptions
): FormatCheckReport {
  const baseName = path.basename(fileName);

  if (!isValidStudentFileName(baseName, options.studentIdPattern)) {
    return {
      fileName: baseName,
      fileNameValid: false,
      studentId: null,
      questions: [],
      fileError: null,
      passed: false,
    };
  }

  const parsed = parseQuerySet(content, { expectedCount: options.expectedCount });
  const bodies = parsed.ok ? parsed.querySet : firstBodies(content);

  const questions: QuestionCheck[] = [];
  for (let index = 1; index <= options.expectedCount; index++) {
    const marker = `--${index}--`;
    const body = bodies.get(index);

    if (body === undefined) {
      questions.push({ index, status: "FAIL", message: `Marker ${marker} is missing.` });
    } else if (isBlankSql(body)) {
      questions.push({ index, status: "FAIL", message: `Marker ${marker} found, but no query follows it.` });
    } else if (!body.endsWith(";")) {
      questions.push({
        index,
        status: "WARNING",
        message: `Marker ${marker} found, but query might be missing a semicolon.`,
      });
    } else {
      questions.push({ index, status: "PASS", message: "Correctly formatted." });
    }
  }

  // not repeated when a question line already says it
  const fileError =
    parsed.ok || questions.some((q) => q.message === parsed.error.message) ? null : parsed.error.message;

  return {
    fileName: baseName,
    fileNameValid: true,
    studentId: studentIdFromFileName(baseName),
    questions,
    fileError,
    passed: parsed.ok && questions.every((q) => q.status !== "FAIL"),
  };
}

function firstBodies(content: string): Map<number, string> {
  const bodies = new Map<number, string>();
  for (const marker of scanMarkers(content)) {
    const index = Number(marker.token);
    if (/^\d+$/.test(marker.token) && !bodies.has(index)) {
      bodies.set(index, marker.body);
    }
  }
  return bodies;
}
