#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config";
import { createDriver } from "../database/createDriver";
import { GraderError, InfrastructureError, describeError } from "../domain/errors";
import { formatScore } from "../domain/grading";
import { listSubmissions, loadInstructorFile } from "../loaders/submissionLoader";
import { EvaluationOrchestrator } from "../services/evaluationOrchestrator";
import { ReportWriter } from "../services/reportWriter";

/**
 * Grade every submission in the queries directory.
 * Ctrl+C stops after the student being graded; the results table then
 * holds only the students that finished.
 */
async function main(): Promise<number> {
  const config = loadConfig();
  const schemaScript = loadInstructorFile(config.schemaFile, "Schema script");
  const modelSolution = loadInstructorFile(config.modelFile, "Model solution");
  const submissions = listSubmissions(config.queriesDir);

  console.log(`Found ${submissions.length} submission(s) in ${config.queriesDir}`);

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("\nInterrupted - finishing the current student before stopping.");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const driver = createDriver(config.database, config.queryTimeoutMs);
  try {
    try {
      await driver.connect();
    } catch (error) {
      throw new InfrastructureError(`Could not connect to the ${driver.kind} database: ${describeError(error)}`, error);
    }

    const orchestrator = new EvaluationOrchestrator({
      database: driver,
      schemaScript,
      modelSolution,
      expectedQuestionCount: config.expectedQuestionCount,
      queryTimeoutMs: config.queryTimeoutMs,
      reports: new ReportWriter({ resultsFile: config.resultsFile, logsDir: config.logsDir }),
      signal: controller.signal,
    });

    const summary = await orchestrator.run(submissions);
    const perfect = summary.scores.filter((s) => s.passed === s.total).length;

    console.log(`Full marks: ${perfect}/${summary.studentsEvaluated}`);
    for (const score of summary.scores) {
      console.log(`  ${score.studentId}: ${formatScore(score)}`);
    }
    console.log(`Results written to ${config.resultsFile}, logs to ${config.logsDir}/`);

    return summary.cancelled ? 130 : 0;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await driver.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof GraderError) {
      console.error(`\nEvaluation aborted: ${error.message}`);
    } else {
      console.error("\nUnexpected error:", error);
    }
    process.exitCode = 1;
  });
