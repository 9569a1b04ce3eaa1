import { QueryExecutor, SchemaAdmin } from "../database/sqlDriver";
import { ConfigurationError, InfrastructureError, describeError } from "../domain/errors";
import {
  QuestionVerdict,
  RunSummary,
  StudentReport,
  StudentScore,
  buildStudentReport,
  failAll,
  formatScore,
} from "../domain/grading";
import { QuerySet, parseQuerySet } from "../domain/markerParser";
import { judgeOutcome } from "../domain/resultComparator";
import { ResultSet } from "../domain/resultSet";
import { QueryRunner } from "./queryRunner";
import { ReportSink } from "./reportWriter";
import { SchemaManager } from "./schemaManager";

export type RunPhase =
  | "INIT"
  | "GROUND_TRUTH_BUILT"
  | "RESET"
  | "RUN_QUESTIONS"
  | "SCORE"
  | "LOG"
  | "FINALIZE";

export type GroundTruth = ReadonlyMap<number, ResultSet>;

export interface StudentSubmission {
  studentId: string;
  read(): string;
}

export interface OrchestratorOptions {
  database: QueryExecutor & SchemaAdmin;
  schemaScript: string;
  modelSolution: string;
  expectedQuestionCount: number;
  queryTimeoutMs: number;
  reports: ReportSink;
  signal?: AbortSignal;
}

/**
 * EvaluationOrchestrator grades a batch of submissions against the model
 * solution, one student at a time, on a schema reset before each student.
 *
 * Problems with one student's file or queries end up in that student's
 * report. Only a broken model solution or a database that cannot be
 * prepared for the ground truth stops the run.
 */
export class EvaluationOrchestrator {
  private currentPhase: RunPhase = "INIT";
  private readonly schema: SchemaManager;
  private readonly runner: QueryRunner;

  constructor(private readonly options: OrchestratorOptions) {
    this.schema = new SchemaManager(options.database, options.schemaScript);
    this.runner = new QueryRunner(options.database, { timeoutMs: options.queryTimeoutMs });
  }

  get phase(): RunPhase {
    return this.currentPhase;
  }

  get schemaGeneration(): number {
    return this.schema.generation;
  }

  async run(submissions: readonly StudentSubmission[]): Promise<RunSummary> {
    this.currentPhase = "INIT";
    const model = this.loadModelSolution();

    console.log(`Building ground truth from ${model.size} model question(s)...`);
    const groundTruth = await this.buildGroundTruth(model);
    this.currentPhase = "GROUND_TRUTH_BUILT";

    this.options.reports.begin([...groundTruth.keys()]);

    const scores: StudentScore[] = [];
    let cancelled = false;

    for (const submission of submissions) {
      if (this.options.signal?.aborted) {
        cancelled = true;
        break;
      }

      console.log(`\nEvaluating student: ${submission.studentId}`);
      const report = await this.evaluateStudent(submission, groundTruth);

      this.currentPhase = "LOG";
      this.options.reports.record(report);
      console.log(`Result: ${formatScore(report)}`);

      scores.push({ studentId: report.studentId, passed: report.passed, total: report.total });
    }

    this.currentPhase = "FINALIZE";
    console.log(
      `\nEvaluation ${cancelled ? "cancelled" : "complete"}: ${scores.length} student(s) graded.`
    );
    return { studentsEvaluated: scores.length, scores, cancelled };
  }

  /**
   * Grade one student on a freshly reset schema. Never throws for problems
   * local to the student.
   */
  async evaluateStudent(
    submission: StudentSubmission,
    groundTruth: GroundTruth
  ): Promise<StudentReport> {
    const questionIndices = [...groundTruth.keys()];
    const failStudent = (failure: "format_error" | "infrastructure_error", diff: string) =>
      buildStudentReport(submission.studentId, attachExpected(failAll(questionIndices, failure, diff), groundTruth));

    this.currentPhase = "RESET";
    try {
      await this.schema.reset();
    } catch (error) {
      if (error instanceof InfrastructureError) {
        return failStudent("infrastructure_error", `Infrastructure error: ${error.message}`);
      }
      throw error;
    }

    let text: string;
    try {
      text = submission.read();
    } catch (error) {
      return failStudent("format_error", `Format error: could not read submission: ${describeError(error)}`);
    }

    const parsed = parseQuerySet(text, { expectedCount: this.options.expectedQuestionCount });
    if (!parsed.ok) {
      return failStudent("format_error", `Format error: ${parsed.error.message}`);
    }

    this.currentPhase = "RUN_QUESTIONS";
    const verdicts: QuestionVerdict[] = [];

    for (const [index, expected] of groundTruth) {
      const sql = parsed.querySet.get(index);
      if (sql === undefined) {
        verdicts.push({
          questionIndex: index,
          status: "FAIL",
          failure: "missing_answer",
          diff: `Missing answer: no --${index}-- marker in the submission.`,
          notes: [],
          expected,
        });
        continue;
      }

      try {
        const outcome = await this.runner.execute(sql);
        verdicts.push(judgeOutcome(index, expected, outcome));
      } catch (error) {
        if (error instanceof InfrastructureError) {
          return failStudent("infrastructure_error", `Infrastructure error: ${error.message}`);
        }
        throw error;
      }
    }

    this.currentPhase = "SCORE";
    return buildStudentReport(submission.studentId, verdicts);
  }

  private loadModelSolution(): QuerySet {
    const expectedCount = this.options.expectedQuestionCount;
    const parsed = parseQuerySet(this.options.modelSolution, { expectedCount });
    if (!parsed.ok) {
      throw new ConfigurationError(`Model solution is malformed: ${parsed.error.message}`);
    }
    if (parsed.querySet.size !== expectedCount) {
      throw new ConfigurationError(
        `Model solution has ${parsed.querySet.size} question(s) but ${expectedCount} are expected.`
      );
    }
    return parsed.querySet;
  }

  private async buildGroundTruth(model: QuerySet): Promise<GroundTruth> {
    await this.schema.reset();

    const truth = new Map<number, ResultSet>();
    for (const [index, sql] of model) {
      const outcome = await this.runner.execute(sql);
      if (outcome.kind === "error") {
        throw new ConfigurationError(`Model solution question ${index} failed: ${outcome.message}`);
      }
      truth.set(index, outcome.result);
    }
    return truth;
  }
}

function attachExpected(verdicts: QuestionVerdict[], groundTruth: GroundTruth): QuestionVerdict[] {
  return verdicts.map((verdict) => ({ ...verdict, expected: groundTruth.get(verdict.questionIndex) }));
}
