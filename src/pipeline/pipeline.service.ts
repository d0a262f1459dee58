import { randomUUID } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../config/configuration';
import {
  errorMessage,
  InvalidWindowError,
  isRetryable,
  PipelineError,
  RunNotFoundError,
} from '../common/errors/pipeline.errors';
import { retryWithBackoff, RetryPolicy } from '../common/utils/retry';
import { AggregationService } from '../aggregation/aggregation.service';
import { assertValidWindow, ExtractionStream, ExtractorService } from './extractor.service';
import { TransformerService } from './transformer.service';
import { LoaderService } from './loader.service';
import { RunRegistry, snapshotRun, isTerminal } from './run-registry.service';
import { RunAuditService } from './run-audit.service';
import {
  Batch,
  PipelineRun,
  PipelineRunOptions,
  ResolvedRunOptions,
  RunFailure,
  RunStage,
  RunStatus,
} from './interfaces/pipeline.types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Day window [00:00, next 00:00) of a YYYY-MM-DD date, naive local time */
export function dayWindow(date: string): { windowStart: Date; windowEnd: Date } {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidWindowError(`Invalid date '${date}', expected YYYY-MM-DD`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const windowStart = new Date(year, month - 1, day);
  if (windowStart.getMonth() !== month - 1 || windowStart.getDate() !== day) {
    throw new InvalidWindowError(`Invalid date '${date}'`);
  }
  return { windowStart, windowEnd: new Date(year, month - 1, day + 1) };
}

/**
 * PipelineService - the ETL orchestrator.
 *
 * One run = one window. Batches are pulled in order and each goes through
 * Transform then Load before the next is fetched. Connectivity faults are
 * retried with exponential backoff; data faults are recorded on the run
 * and never retried. Runs are owned by the RunRegistry while live and by
 * the audit table once terminal.
 *
 * Entry points:
 * - runPipeline(): resolves with the terminal run
 * - startPipeline(): returns the Running snapshot, work continues in the background
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private readonly inFlight = new Map<string, Promise<PipelineRun>>();

  constructor(
    private readonly extractor: ExtractorService,
    private readonly transformer: TransformerService,
    private readonly loader: LoaderService,
    private readonly aggregation: AggregationService,
    private readonly registry: RunRegistry,
    private readonly audit: RunAuditService,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  async runPipeline(
    windowStart: Date,
    windowEnd: Date,
    options: PipelineRunOptions = {},
  ): Promise<PipelineRun> {
    const { run, resolved } = this.prepare(windowStart, windowEnd, options);
    return this.track(run.runId, this.execute(run, resolved));
  }

  startPipeline(
    windowStart: Date,
    windowEnd: Date,
    options: PipelineRunOptions = {},
  ): PipelineRun {
    const { run, resolved } = this.prepare(windowStart, windowEnd, options);
    this.track(run.runId, this.execute(run, resolved)).catch((error: unknown) =>
      this.logger.error(`Background run ${run.runId} crashed: ${errorMessage(error)}`),
    );
    // execute() moves the run to Running before its first await
    return snapshotRun(run);
  }

  runForDate(date: string, options: PipelineRunOptions = {}): Promise<PipelineRun> {
    const { windowStart, windowEnd } = dayWindow(date);
    return this.runPipeline(windowStart, windowEnd, options);
  }

  /** Cooperative: honoured at the next batch boundary */
  cancelRun(runId: string): PipelineRun {
    const run = this.registry.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (this.registry.requestCancel(runId)) {
      this.logger.log(`Cancellation requested for run ${runId}`);
    }
    return run;
  }

  async getRun(runId: string): Promise<PipelineRun> {
    const live = this.registry.get(runId);
    if (live) return live;

    const persisted = await this.audit.findRun(runId);
    if (!persisted) {
      throw new RunNotFoundError(runId);
    }
    return persisted;
  }

  /** Live runs of this process merged with audited ones, newest first */
  async listRuns(limit = 20): Promise<PipelineRun[]> {
    const live = this.registry.list(limit);
    const liveIds = new Set(live.map((run) => run.runId));
    const persisted = await this.audit.listRuns(limit);

    return [...live, ...persisted.filter((run) => !liveIds.has(run.runId))]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  /** Resolves once the given run is terminal; used by tests and graceful shutdown */
  async waitForRun(runId: string): Promise<PipelineRun> {
    const pending = this.inFlight.get(runId);
    return pending ?? this.getRun(runId);
  }

  resolveOptions(options: PipelineRunOptions): ResolvedRunOptions {
    const config = this.configService;
    return {
      batchSize: options.batchSize ?? config.get('BATCH_SIZE', { infer: true }),
      maxAttempts: options.maxAttempts ?? config.get('MAX_ATTEMPTS', { infer: true }),
      backoffBaseMs: options.backoffBaseMs ?? config.get('BACKOFF_BASE_MS', { infer: true }),
      backoffMaxMs: options.backoffMaxMs ?? config.get('BACKOFF_MAX_MS', { infer: true }),
      continueOnBatchFailure:
        options.continueOnBatchFailure ??
        config.get('CONTINUE_ON_BATCH_FAILURE', { infer: true }),
      timeoutMs: options.timeoutMs ?? config.get('STORE_TIMEOUT_MS', { infer: true }),
      aggregate: options.aggregate ?? config.get('AGGREGATION_ENABLED', { infer: true }),
      sensorId: options.sensorId ?? config.get('SENSOR_ID', { infer: true }),
    };
  }

  private prepare(
    windowStart: Date,
    windowEnd: Date,
    options: PipelineRunOptions,
  ): { run: PipelineRun; resolved: ResolvedRunOptions } {
    assertValidWindow(windowStart, windowEnd);
    const resolved = this.resolveOptions(options);

    const run: PipelineRun = {
      runId: randomUUID(),
      windowStart: new Date(windowStart),
      windowEnd: new Date(windowEnd),
      status: RunStatus.Pending,
      recordsProcessed: 0,
      recordsFailed: 0,
      batchesSucceeded: 0,
      batchesFailed: 0,
      cancelled: false,
      createdAt: new Date(),
      startedAt: null,
      finishedAt: null,
      failures: [],
    };

    // Throws RunAlreadyActive when the window is taken
    this.registry.register(run);
    return { run, resolved };
  }

  private track(runId: string, execution: Promise<PipelineRun>): Promise<PipelineRun> {
    this.inFlight.set(runId, execution);
    return execution.finally(() => this.inFlight.delete(runId));
  }

  private async execute(run: PipelineRun, options: ResolvedRunOptions): Promise<PipelineRun> {
    const policy: RetryPolicy = {
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.backoffBaseMs,
      maxDelayMs: options.backoffMaxMs,
    };
    let aborted = false;
    let aggregationFailed = false;
    let stage: RunStage = 'extract';

    this.registry.transition(run.runId, RunStatus.Running);
    this.logger.log(
      `Run ${run.runId} started for [${run.windowStart.toISOString()}, ${run.windowEnd.toISOString()})`,
    );

    try {
      const stream = this.extractor.extract(
        run.windowStart,
        run.windowEnd,
        options.batchSize,
        options.timeoutMs,
      );

      for (;;) {
        if (this.registry.isCancelRequested(run.runId)) {
          run.cancelled = true;
          this.logger.warn(
            `Run ${run.runId} cancelled after ${run.batchesSucceeded + run.batchesFailed} batch(es)`,
          );
          break;
        }

        stage = 'extract';
        const batch = await this.fetchBatch(run, stream, policy);
        if (batch === undefined) {
          aborted = true;
          break;
        }
        if (batch === null) break;

        stage = 'transform';
        const loaded = await this.processBatch(run, batch, options, policy);
        if (!loaded && !options.continueOnBatchFailure) {
          aborted = true;
          this.logger.error(`Run ${run.runId} aborted at batch ${batch.sequence}`);
          break;
        }
      }

      if (options.aggregate && !run.cancelled && run.batchesSucceeded > 0) {
        stage = 'aggregate';
        aggregationFailed = !(await this.aggregateWindow(run, options, policy));
      }

      this.finish(run, this.terminalStatus(run, aborted || aggregationFailed));
    } catch (error) {
      // Anything outside the error taxonomy is a defect, not a data or connectivity fault
      this.recordFailure(run, {
        kind: error instanceof PipelineError ? error.kind : 'Internal',
        stage,
        batchSequence: null,
        message: errorMessage(error),
      });
      this.logger.error(`Run ${run.runId} failed unexpectedly: ${errorMessage(error)}`);
      this.finish(run, RunStatus.Failed);
    }

    await this.persistAudit(run);
    return snapshotRun(run);
  }

  /** undefined: source unavailable after retries; null: window exhausted */
  private async fetchBatch(
    run: PipelineRun,
    stream: ExtractionStream,
    policy: RetryPolicy,
  ): Promise<Batch | null | undefined> {
    const sequence = run.batchesSucceeded + run.batchesFailed;
    try {
      return await retryWithBackoff(() => stream.next(), policy, {
        isRetryable,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(
            `Run ${run.runId} batch ${sequence}: fetch attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`,
          ),
      });
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      run.batchesFailed++;
      this.recordFailure(run, this.batchFailure(error, 'extract', sequence));
      this.logger.error(
        `Run ${run.runId} batch ${sequence}: source unavailable after ${policy.maxAttempts} attempt(s)`,
      );
      return undefined;
    }
  }

  /** Returns false when the batch could not be committed */
  private async processBatch(
    run: PipelineRun,
    batch: Batch,
    options: ResolvedRunOptions,
    policy: RetryPolicy,
  ): Promise<boolean> {
    for (const corrupt of batch.corrupt) {
      run.recordsFailed++;
      this.recordFailure(run, {
        kind: corrupt.kind,
        stage: 'extract',
        batchSequence: batch.sequence,
        message: corrupt.message,
        recordId: corrupt.recordId,
        recordTimestamp: corrupt.recordTimestamp,
      });
    }

    const transformed = this.transformer.transformBatch(batch, options.sensorId);
    for (const { error } of transformed.rejected) {
      run.recordsFailed++;
      this.recordFailure(run, {
        kind: error.kind,
        stage: 'transform',
        batchSequence: batch.sequence,
        message: error.message,
        recordId: error.recordId,
        recordTimestamp: error.recordTimestamp,
        field: error.field,
      });
    }
    if (transformed.rejected.length > 0) {
      this.logger.warn(
        `Run ${run.runId} batch ${batch.sequence}: ${transformed.rejected.length} reading(s) rejected by validation`,
      );
    }

    try {
      const result = await retryWithBackoff(
        () => this.loader.load(transformed.valid, options.timeoutMs),
        policy,
        {
          isRetryable,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Run ${run.runId} batch ${batch.sequence}: load attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`,
            ),
        },
      );
      run.recordsProcessed += transformed.valid.length;
      run.batchesSucceeded++;
      this.logger.log(
        `Run ${run.runId} batch ${batch.sequence}: ${transformed.valid.length} loaded (${result.inserted} inserted, ${result.updated} updated)`,
      );
      return true;
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      run.recordsFailed += transformed.valid.length;
      run.batchesFailed++;
      this.recordFailure(run, this.batchFailure(error, 'load', batch.sequence));
      this.logger.error(
        `Run ${run.runId} batch ${batch.sequence}: load failed (${error.kind}), ${transformed.valid.length} reading(s) rolled back`,
      );
      return false;
    }
  }

  private async aggregateWindow(
    run: PipelineRun,
    options: ResolvedRunOptions,
    policy: RetryPolicy,
  ): Promise<boolean> {
    try {
      await retryWithBackoff(
        () =>
          this.aggregation.aggregateWindow(
            run.windowStart,
            run.windowEnd,
            options.sensorId,
            options.timeoutMs,
          ),
        policy,
        { isRetryable },
      );
      return true;
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      this.recordFailure(run, this.batchFailure(error, 'aggregate', null));
      this.logger.error(`Run ${run.runId}: aggregation failed (${error.message})`);
      return false;
    }
  }

  private terminalStatus(run: PipelineRun, hadFailure: boolean): RunStatus {
    if (!hadFailure && run.batchesFailed === 0 && !run.cancelled) {
      return RunStatus.Succeeded;
    }
    return run.batchesSucceeded > 0 || run.cancelled
      ? RunStatus.PartiallyFailed
      : RunStatus.Failed;
  }

  private finish(run: PipelineRun, status: RunStatus): void {
    if (isTerminal(run.status)) return;
    this.registry.transition(run.runId, status);
    this.logger.log(
      `Run ${run.runId} finished ${status}: ${run.recordsProcessed} processed, ${run.recordsFailed} failed, ` +
        `${run.batchesSucceeded}/${run.batchesSucceeded + run.batchesFailed} batch(es) loaded`,
    );
  }

  private async persistAudit(run: PipelineRun): Promise<void> {
    try {
      await this.audit.persist(snapshotRun(run));
    } catch (error) {
      this.logger.error(`Audit for run ${run.runId} not persisted: ${errorMessage(error)}`);
    }
  }

  private recordFailure(run: PipelineRun, failure: RunFailure): void {
    run.failures.push(failure);
  }

  private batchFailure(
    error: PipelineError,
    stage: RunStage,
    batchSequence: number | null,
  ): RunFailure {
    return { kind: error.kind, stage, batchSequence, message: error.message };
  }
}
