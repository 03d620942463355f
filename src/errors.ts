/**
 * Application errors.
 * Every domain failure carries a stable `code`; callers branch on the class,
 * reports and logs use the code.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Oracle ──

/** No credentials, network failure or timeout. Triggers heuristic fallback. */
export class OracleUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ORACLE_UNAVAILABLE', message, details);
  }
}

/** The oracle answered, but not with anything usable, even after repair. */
export class OracleInvalidResponseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ORACLE_INVALID_RESPONSE', message, details);
  }
}

export type OracleError = OracleUnavailableError | OracleInvalidResponseError;

export function isOracleError(err: unknown): err is OracleError {
  return err instanceof OracleUnavailableError || err instanceof OracleInvalidResponseError;
}

// ── Ingestion ──

export class FileLoadError extends AppError {
  constructor(file: string, message: string) {
    super('FILE_LOAD_ERROR', `Could not load ${file}: ${message}`, { file });
  }
}

export class RowExtractionError extends AppError {
  constructor(row: number, message: string) {
    super('ROW_EXTRACTION_ERROR', `Row ${row}: ${message}`, { row });
  }
}

export class PipelineFatalError extends AppError {
  constructor(message: string) {
    super('PIPELINE_FATAL', message);
  }
}

/** A write reached the unified store after ingestion froze it. */
export class StoreFrozenError extends AppError {
  constructor() {
    super('STORE_FROZEN', 'Unified store is frozen; ingestion has already finished');
  }
}

// ── Orchestration ──

/** An analysis or synthesis body threw something that is not an AppError. */
export class TaskFailedError extends AppError {
  constructor(task: string, message: string) {
    super('TASK_FAILED', message, { task });
  }
}

export class SynthesisPreconditionError extends AppError {
  constructor() {
    super('SYNTHESIS_PRECONDITION', 'Synthesis requires at least one non-empty platform finding set');
  }
}

export class InvalidTaskTransitionError extends AppError {
  constructor(task: string, from: string, to: string) {
    super('INVALID_TASK_TRANSITION', `Task "${task}" cannot move from ${from} to ${to}`, {
      task,
      from,
      to,
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

/** Shape stored on a failed TaskResult. */
export interface TaskError {
  code: string;
  message: string;
}

export function toTaskError(err: unknown, task: string): TaskError {
  const failure =
    err instanceof AppError ? err : new TaskFailedError(task, err instanceof Error ? err.message : String(err));
  return { code: failure.code, message: failure.message };
}
