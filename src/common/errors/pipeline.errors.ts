/**
 * Error taxonomy shared by the pipeline, the exporter and the HTTP layer.
 *
 * `retryable` marks connectivity faults: the orchestrator retries those with
 * backoff. Data faults (CorruptRecord, ValidationError) and
 * ConstraintViolation are recorded against the run and never retried.
 */
export type PipelineErrorKind =
  | 'InvalidWindow'
  | 'SourceUnavailable'
  | 'TargetUnavailable'
  | 'CorruptRecord'
  | 'ValidationError'
  | 'ConstraintViolation'
  | 'StoreUnavailable'
  | 'RunAlreadyActive'
  | 'RunNotFound'
  | 'ExportFailed';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidWindowError extends PipelineError {
  readonly kind = 'InvalidWindow';
  readonly retryable = false;
}

export class SourceUnavailableError extends PipelineError {
  readonly kind = 'SourceUnavailable';
  readonly retryable = true;
}

export class TargetUnavailableError extends PipelineError {
  readonly kind = 'TargetUnavailable';
  readonly retryable = true;
}

export class StoreUnavailableError extends PipelineError {
  readonly kind = 'StoreUnavailable';
  readonly retryable = false;
}

/** The export file could not be written to the export directory */
export class ExportFailedError extends PipelineError {
  readonly kind = 'ExportFailed';
  readonly retryable = false;
}

export class ConstraintViolationError extends PipelineError {
  readonly kind = 'ConstraintViolation';
  readonly retryable = false;
}

/**
 * Row read from the source that breaks the reading invariants
 * (missing timestamp, non-finite numeric value).
 */
export class CorruptRecordError extends PipelineError {
  readonly kind = 'CorruptRecord';
  readonly retryable = false;

  constructor(
    public readonly recordId: number | null,
    public readonly recordTimestamp: Date | null,
    reason: string,
  ) {
    super(
      `Corrupt record id=${recordId ?? 'unknown'} timestamp=${formatTimestamp(recordTimestamp)}: ${reason}`,
    );
  }
}

export class ValidationError extends PipelineError {
  readonly kind = 'ValidationError';
  readonly retryable = false;

  constructor(
    public readonly field: string,
    public readonly reason: string,
    public readonly recordId: number | null = null,
    public readonly recordTimestamp: Date | null = null,
  ) {
    super(`Invalid ${field}: ${reason}`);
  }
}

export class RunAlreadyActiveError extends PipelineError {
  readonly kind = 'RunAlreadyActive';
  readonly retryable = false;

  constructor(public readonly activeRunId: string) {
    super(`A run covering an overlapping window is already active: ${activeRunId}`);
  }
}

export class RunNotFoundError extends PipelineError {
  readonly kind = 'RunNotFound';
  readonly retryable = false;

  constructor(public readonly runId: string) {
    super(`Run not found: ${runId}`);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof PipelineError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatTimestamp(value: Date | null): string {
  if (!value || Number.isNaN(value.getTime())) return 'unknown';
  return value.toISOString();
}

/**
 * Postgres SQLSTATE of a driver error, when there is one.
 * TypeORM wraps driver errors in QueryFailedError and keeps the original
 * under `driverError`; both carry `code`.
 */
export function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const driverError: unknown = Reflect.get(error, 'driverError');
  const carrier = typeof driverError === 'object' && driverError !== null ? driverError : error;
  const code: unknown = Reflect.get(carrier, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Data exceptions (class 22) and integrity violations (class 23) do not go
 * away on retry; everything else on a write path is treated as the target
 * being unavailable.
 */
export function classifyTargetError(error: unknown, context: string): PipelineError {
  if (error instanceof PipelineError) return error;
  const code = sqlState(error);
  const detail = `${context}: ${errorMessage(error)}`;
  if (code && (code.startsWith('22') || code.startsWith('23'))) {
    return new ConstraintViolationError(`${detail} (SQLSTATE ${code})`, error);
  }
  return new TargetUnavailableError(detail, error);
}
