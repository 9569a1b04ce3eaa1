#!/usr/bin/env node
import "dotenv/config";
import fs from "fs";
import { loadConfig } from "../config";
import { CheckStatus, FormatCheckReport, checkSubmissionFormat } from "../domain/formatChecker";

const DIVIDER = "-".repeat(41);

const LABELS: Record<CheckStatus, string> = {
  PASS: "[PASS]",
  WARNING: "[WARN]",
  FAIL: "[FAIL]",
};

export interface CheckFormatArgs {
  file: string | null;
  expectedCount: number;
}

/**
 * `check-format <file> [count]` or `check-format <count> <file>`.
 */
export function parseArgs(argv: string[], defaultCount: number): CheckFormatArgs {
  let file: string | null = null;
  let expectedCount = defaultCount;

  for (const arg of argv.slice(0, 2)) {
    if (/^\d+$/.test(arg)) {
      expectedCount = Number(arg);
    } else if (file === null) {
      file = arg;
    }
  }
  return { file, expectedCount };
}

export function printReport(report: FormatCheckReport, expectedCount: number): void {
  if (!report.fileNameValid) {
    console.log(`Error: Invalid filename '${report.fileName}'.`);
    console.log("Your file MUST be named as your Student ID (e.g., 2023A7PS0043H.sql).");
    console.log("Generic names like 'submission.sql' or 'ans.sql' are NOT accepted.");
    return;
  }

  console.log(`Checking ${report.fileName} for ${expectedCount} queries...\n`);
  for (const question of report.questions) {
    console.log(`Query ${question.index}: ${LABELS[question.status]} ${question.message}`);
  }
  if (report.fileError) {
    console.log(`File: ${LABELS.FAIL} ${report.fileError}`);
  }

  console.log(`\n${DIVIDER}`);
  if (report.passed) {
    console.log("SUMMARY: ALL FORMATTING CHECKS PASSED!");
    console.log("You are ready to submit your file.");
  } else {
    console.log("SUMMARY: FORMATTING ERRORS FOUND.");
    console.log("Please fix the issues above before submitting.");
  }
  console.log(DIVIDER);
}

function main(): number {
  const config = loadConfig();
  const args = parseArgs(process.argv.slice(2), config.expectedQuestionCount);

  console.log("=========================================");
  console.log("         SQL SUBMISSION FORMAT CHECK     ");
  console.log("=========================================\n");

  if (!args.file) {
    console.log("Usage: check-format <your_student_id>.sql [expected_queries]");
    const sqlFiles = fs.readdirSync(".").filter((f) => f.endsWith(".sql"));
    if (sqlFiles.length > 0) {
      console.log("\nFound these .sql files in the folder:");
      sqlFiles.forEach((f) => console.log(` - ${f}`));
    }
    return 1;
  }

  if (!fs.existsSync(args.file)) {
    console.log(`Error: File '${args.file}' not found.`);
    console.log("Make sure the file is in this folder or give its full path.");
    return 1;
  }

  const content = fs.readFileSync(args.file, "utf-8");
  const report = checkSubmissionFormat(args.file, content, {
    expectedCount: args.expectedCount,
    studentIdPattern: config.studentIdPattern,
  });
  printReport(report, args.expectedCount);
  return report.passed ? 0 : 1;
}

if (require.main === module) {
  try {
    process.exitCode = main();
  } catch (error) {
    console.error(`\nAn error occurred: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
