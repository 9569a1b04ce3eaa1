/**
 * Error taxonomy for a grading run.
 *
 * FormatError and InfrastructureError are contained to one student.
 * ConfigurationError always ends the run. QueryError and QueryTimeoutError
 * never leave the query runner: they become failed QueryOutcomes.
 */
export class GraderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A submission (or the model solution) could not be split into questions. */
export class FormatError extends GraderError {}

/** The shared database could not be reset or reached. */
export class InfrastructureError extends GraderError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/** The run itself is misconfigured: bad settings or a broken model solution. */
export class ConfigurationError extends GraderError {}

/** The engine rejected a statement (syntax, constraint, missing object). */
export class QueryError extends GraderError {
  constructor(message: string, readonly code?: string) {
    super(message);
  }
}

/** The engine or the runner gave up on a statement after the timeout. */
export class QueryTimeoutError extends GraderError {
  constructor(readonly timeoutMs: number) {
    super(`query exceeded ${timeoutMs}ms`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
