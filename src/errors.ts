/**
 * Error taxonomy for dataset runs
 *
 * Fatal errors carry the process exit status the CLI reports. Structural
 * parse errors are recorded per unit and never abort a run.
 */

// ============================================================================
// Base Class
// ============================================================================

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

// ============================================================================
// Fetch Errors
// ============================================================================

/**
 * Retry-eligible failure: network error, timeout, non-definitive HTTP status.
 */
export class TransientError extends PipelineError {
  readonly code = "TRANSIENT" as const;
  readonly exitCode = 2;
  readonly status?: number;

  constructor(
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, options.status !== undefined ? { status: options.status } : undefined);
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The resource is confirmed absent and will not appear on a retry.
 */
export class PermanentError extends PipelineError {
  readonly code = "PERMANENT" as const;
  readonly exitCode = 1;
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, status !== undefined ? { status } : undefined);
    this.status = status;
  }
}

export class RetryExhaustedError extends PipelineError {
  readonly code = "RETRY_EXHAUSTED" as const;
  readonly exitCode = 2;
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed after ${String(attempts)} attempts: ${reason}`, {
      operation,
      attempts,
    });
    this.attempts = attempts;
    this.cause = cause;
  }
}

/**
 * A precondition for fetching is missing: no connectivity, no git binary,
 * or a pagination probe without a usable item count.
 */
export class SourceUnavailableError extends PipelineError {
  readonly code = "SOURCE_UNAVAILABLE" as const;
  readonly exitCode = 1;
}

// ============================================================================
// Normalization / Publication Errors
// ============================================================================

export class StructuralParseError extends PipelineError {
  readonly code = "STRUCTURAL_PARSE" as const;
  readonly exitCode = 4;
  readonly unit: string;

  constructor(unit: string, reason: string) {
    super(`Cannot parse ${unit}: ${reason}`, { unit });
    this.unit = unit;
  }
}

/**
 * A fetched unit could not be read back from local storage.
 */
export class UnitReadError extends PipelineError {
  readonly code = "UNIT_READ" as const;
  readonly exitCode = 1;
}

export class PublishError extends PipelineError {
  readonly code = "PUBLISH_FAILED" as const;
  readonly exitCode = 3;
}

export class ConfigError extends PipelineError {
  readonly code = "CONFIG_ERROR" as const;
  readonly exitCode = 1;
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof PipelineError ? error.exitCode : 1;
}
