import fs from "fs";
import path from "path";
import { ConfigurationError } from "../domain/errors";

/**
 * A student's file, read only when the orchestrator gets to it so that an
 * unreadable file fails that student alone.
 */
export interface SubmissionFile {
  studentId: string;
  filePath: string;
  read(): string;
}

/**
 * Read an instructor-provided file (schema script, model solution).
 * A missing file is a configuration problem for the whole run.
 */
export function loadInstructorFile(filePath: string, description: string): string {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`${description} not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * List the `.sql` files in the submissions directory, ordered by student
 * identifier. The identifier is the file name without its extension.
 */
export function listSubmissions(queriesDir: string): SubmissionFile[] {
  if (!fs.existsSync(queriesDir)) {
    throw new ConfigurationError(`Submissions directory not found: ${queriesDir}`);
  }

  return fs
    .readdirSync(queriesDir)
    .filter((f) => f.toLowerCase().endsWith(".sql"))
    .sort()
    .map((fileName) => {
      const filePath = path.join(queriesDir, fileName);
      return {
        studentId: fileName.slice(0, -".sql".length),
        filePath,
        read: () => fs.readFileSync(filePath, "utf-8"),
      };
    });
}
