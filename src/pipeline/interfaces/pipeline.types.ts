import { CorruptRecordError, PipelineErrorKind } from '../../common/errors/pipeline.errors';

/**
 * One reading of the source `data` table.
 * Numeric fields are null on sensor dropout and stay null end to end.
 */
export interface SensorReading {
  id: number;
  timestamp: Date;
  windSpeed: number | null;
  power: number | null;
  ambientTemperature: number | null;
}

/**
 * Bounded page of readings, ordered by timestamp (ties by id).
 * `corrupt` lists rows excluded at read time.
 */
export interface Batch {
  sequence: number;
  readings: SensorReading[];
  corrupt: CorruptRecordError[];
}

/** Reading as written to the target store */
export interface TransformedReading {
  sensorId: string;
  sourceId: number;
  timestamp: Date;
  windSpeed: number | null;
  power: number | null;
  ambientTemperature: number | null;
}

export interface LoadResult {
  inserted: number;
  updated: number;
  failed: number;
}

export enum RunStatus {
  Pending = 'Pending',
  Running = 'Running',
  Succeeded = 'Succeeded',
  Failed = 'Failed',
  PartiallyFailed = 'PartiallyFailed',
}

export const TERMINAL_STATUSES: readonly RunStatus[] = [
  RunStatus.Succeeded,
  RunStatus.Failed,
  RunStatus.PartiallyFailed,
];

export type RunStage = 'extract' | 'transform' | 'load' | 'aggregate';

/** Unexpected errors outside the taxonomy are recorded as Internal */
export type RunFailureKind = PipelineErrorKind | 'Internal';

export interface RunFailure {
  kind: RunFailureKind;
  stage: RunStage;
  batchSequence: number | null;
  message: string;
  recordId?: number | null;
  recordTimestamp?: Date | null;
  field?: string | null;
}

export interface PipelineRun {
  runId: string;
  windowStart: Date;
  windowEnd: Date;
  status: RunStatus;
  recordsProcessed: number;
  recordsFailed: number;
  batchesSucceeded: number;
  batchesFailed: number;
  cancelled: boolean;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  failures: RunFailure[];
}

/** Per-run overrides of the configured pipeline settings */
export interface PipelineRunOptions {
  batchSize?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  continueOnBatchFailure?: boolean;
  timeoutMs?: number;
  aggregate?: boolean;
  sensorId?: string;
}

export type ResolvedRunOptions = Required<PipelineRunOptions>;
