import { QueryExecutor } from "../database/sqlDriver";
import {
  InfrastructureError,
  QueryError,
  QueryTimeoutError,
  describeError,
} from "../domain/errors";
import { QueryOutcome, failure, success } from "../domain/resultSet";

export const TIMEOUT_MESSAGE = "timeout";

export interface QueryRunnerOptions {
  timeoutMs: number;
}

/**
 * Strip surrounding whitespace and trailing statement terminators.
 */
export function normalizeStatement(sql: string): string {
  return sql.trim().replace(/(\s*;)+$/, "").trim();
}

/**
 * QueryRunner executes one answer at a time. Engine errors and timeouts
 * are ordinary outcomes of grading; only a database that cannot be used
 * at all raises, as an InfrastructureError.
 */
export class QueryRunner {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly options: QueryRunnerOptions
  ) {}

  async execute(sql: string): Promise<QueryOutcome> {
    const statement = normalizeStatement(sql);
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new QueryTimeoutError(this.options.timeoutMs)), this.options.timeoutMs);
    });

    try {
      const result = await Promise.race([this.executor.query(statement), deadline]);
      return success(result);
    } catch (error) {
      if (error instanceof QueryTimeoutError) {
        return failure(TIMEOUT_MESSAGE);
      }
      if (error instanceof QueryError) {
        return failure(error.message);
      }
      throw new InfrastructureError(`Database unavailable: ${describeError(error)}`, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
