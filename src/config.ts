import { z } from "zod";
import { ConfigurationError } from "./domain/errors";
import { DEFAULT_STUDENT_ID_PATTERN } from "./domain/formatChecker";

const EnvSchema = z
  .object({
    DB_DRIVER: z.enum(["postgres", "sqlite"]).default("sqlite"),
    DATABASE_URL: z.string().min(1).optional(),
    PG_SCHEMA: z.string().min(1).default("grading"),
    SQLITE_PATH: z.string().min(1).default(":memory:"),
    SCHEMA_FILE: z.string().min(1).default("schema.sql"),
    MODEL_FILE: z.string().min(1).default("model_solution.sql"),
    QUERIES_DIR: z.string().min(1).default("queries"),
    LOGS_DIR: z.string().min(1).default("logs"),
    RESULTS_FILE: z.string().min(1).default("results.csv"),
    EXPECTED_QUERIES: z.coerce.number().int().min(1).default(2),
    QUERY_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
    STUDENT_ID_PATTERN: z.string().min(1).optional(),
    API_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    SUBMISSIONS_DATA_DIR: z.string().min(1).default("data"),
  })
  .refine((env) => env.DB_DRIVER !== "postgres" || env.DATABASE_URL !== undefined, {
    message: "DATABASE_URL is required when DB_DRIVER=postgres",
    path: ["DATABASE_URL"],
  });

export type DatabaseConfig =
  | { driver: "postgres"; connectionString: string; schema: string }
  | { driver: "sqlite"; filename: string };

export interface GraderConfig {
  database: DatabaseConfig;
  schemaFile: string;
  modelFile: string;
  queriesDir: string;
  logsDir: string;
  resultsFile: string;
  expectedQuestionCount: number;
  queryTimeoutMs: number;
  studentIdPattern: RegExp;
  apiPort: number;
  submissionsDataDir: string;
}

/**
 * Read the grader's settings from the environment. Entry points load
 * `.env` through dotenv before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GraderConfig {
  // treat VAR= as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const vars = parsed.data;

  return {
    database:
      vars.DB_DRIVER === "postgres" && vars.DATABASE_URL
        ? { driver: "postgres", connectionString: vars.DATABASE_URL, schema: vars.PG_SCHEMA }
        : { driver: "sqlite", filename: vars.SQLITE_PATH },
    schemaFile: vars.SCHEMA_FILE,
    modelFile: vars.MODEL_FILE,
    queriesDir: vars.QUERIES_DIR,
    logsDir: vars.LOGS_DIR,
    resultsFile: vars.RESULTS_FILE,
    expectedQuestionCount: vars.EXPECTED_QUERIES,
    queryTimeoutMs: vars.QUERY_TIMEOUT_MS,
    studentIdPattern: vars.STUDENT_ID_PATTERN
      ? compilePattern(vars.STUDENT_ID_PATTERN)
      : DEFAULT_STUDENT_ID_PATTERN,
    apiPort: vars.API_PORT,
    submissionsDataDir: vars.SUBMISSIONS_DATA_DIR,
  };
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch {
    throw new ConfigurationError(`STUDENT_ID_PATTERN is not a valid regular expression: ${source}`);
  }
}
