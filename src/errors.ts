export type ErrorCode =
  | "UNKNOWN_DEPENDENCY"
  | "CYCLE"
  | "DUPLICATE_TASK"
  | "UNKNOWN_TASK"
  | "WRONG_WAVE"
  | "UNMET_DEPENDENCIES"
  | "ALREADY_SPAWNED"
  | "PARALLEL_VIOLATION"
  | "ACQUIRE_TIMEOUT"
  | "VALIDATION_FAILED"
  | "INVALID_RETRY"
  | "UNKNOWN_RUN"
  | "CONFIG_INVALID";

/** Base class for every error the scheduler raises on purpose. */
export class SchedulerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The declared graph is malformed. Fatal: the caller must fix the declaration. */
export class GraphError extends SchedulerError {
  constructor(code: "UNKNOWN_DEPENDENCY" | "CYCLE" | "DUPLICATE_TASK" | "UNKNOWN_TASK", message: string) {
    super(code, message);
  }
}

/** A spawn was rejected before any resource was consumed. Recoverable by waiting. */
export class SpawnValidationError extends SchedulerError {
  readonly taskId: string;

  constructor(
    code: "UNKNOWN_TASK" | "WRONG_WAVE" | "UNMET_DEPENDENCIES" | "ALREADY_SPAWNED",
    taskId: string,
    message: string,
  ) {
    super(code, message);
    this.taskId = taskId;
  }
}

/** Members of one wave were spawned further apart than the parallel window allows. */
export class ParallelExecutionError extends SchedulerError {
  readonly spreadMs: number;
  readonly windowMs: number;

  constructor(message: string, spreadMs: number, windowMs: number) {
    super("PARALLEL_VIOLATION", message);
    this.spreadMs = spreadMs;
    this.windowMs = windowMs;
  }
}

/** No permit became available for a resource bucket in time. No task record exists. */
export class AcquireTimeoutError extends SchedulerError {
  readonly resourceClass: string;
  readonly bucket: string;

  constructor(resourceClass: string, bucket: string, timeoutMs: number) {
    super(
      "ACQUIRE_TIMEOUT",
      `Timed out after ${timeoutMs}ms waiting for a "${bucket}" permit (resource class "${resourceClass}")`,
    );
    this.resourceClass = resourceClass;
    this.bucket = bucket;
  }
}

export class ValidationError extends SchedulerError {
  constructor(code: "VALIDATION_FAILED" | "INVALID_RETRY" | "UNKNOWN_RUN", message: string) {
    super(code, message);
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
