export { loadConfig } from "./config";
export type { GraderConfig, DatabaseConfig } from "./config";
export * from "./domain/errors";
export * from "./domain/grading";
export * from "./domain/resultSet";
export { parseQuerySet, scanMarkers } from "./domain/markerParser";
export type { QuerySet, ParseResult, ParseOptions } from "./domain/markerParser";
export { compareResults, judgeOutcome, diffRows } from "./domain/resultComparator";
export type { RowDiff } from "./domain/resultComparator";
export { checkSubmissionFormat, DEFAULT_STUDENT_ID_PATTERN } from "./domain/formatChecker";
export type { FormatCheckReport, QuestionCheck } from "./domain/formatChecker";
export type { SqlDriver, QueryExecutor, SchemaAdmin } from "./database/sqlDriver";
export { createDriver } from "./database/createDriver";
export { PostgresDriver } from "./database/postgresDriver";
export { SqliteDriver } from "./database/sqliteDriver";
export { SchemaManager } from "./services/schemaManager";
export { QueryRunner } from "./services/queryRunner";
export { EvaluationOrchestrator } from "./services/evaluationOrchestrator";
export type { GroundTruth, RunPhase, StudentSubmission } from "./services/evaluationOrchestrator";
export { ReportWriter, formatStudentLog } from "./services/reportWriter";
export type { ReportSink } from "./services/reportWriter";
export { listSubmissions, loadInstructorFile } from "./loaders/submissionLoader";
