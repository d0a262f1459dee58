import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { TARGET_CONNECTION } from '../database/database.constants';
import { PipelineRunRecord } from '../database/entities/pipeline-run.entity';
import { RunFailureRecord } from '../database/entities/run-failure.entity';
import { classifyTargetError } from '../common/errors/pipeline.errors';
import {
  PipelineRun,
  RunFailure,
  RunFailureKind,
  RunStage,
  RunStatus,
} from './interfaces/pipeline.types';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * RunAuditService - durable record of terminal runs.
 *
 * A run and its failure causes are inserted in one transaction when the
 * run becomes terminal. Rows are never updated afterwards.
 */
@Injectable()
export class RunAuditService {
  private readonly logger = new Logger(RunAuditService.name);

  constructor(
    @InjectDataSource(TARGET_CONNECTION)
    private readonly targetDataSource: DataSource,
    @InjectRepository(PipelineRunRecord, TARGET_CONNECTION)
    private readonly runRepository: Repository<PipelineRunRecord>,
  ) {}

  async persist(run: PipelineRun): Promise<void> {
    try {
      await this.targetDataSource.transaction(async (manager) => {
        await manager.insert(PipelineRunRecord, {
          runId: run.runId,
          windowStart: run.windowStart,
          windowEnd: run.windowEnd,
          status: run.status,
          recordsProcessed: run.recordsProcessed,
          recordsFailed: run.recordsFailed,
          batchesSucceeded: run.batchesSucceeded,
          batchesFailed: run.batchesFailed,
          cancelled: run.cancelled,
          createdAt: run.createdAt,
          startedAt: run.startedAt,
          finishedAt: run.finishedAt,
        });

        if (run.failures.length > 0) {
          await manager.insert(
            RunFailureRecord,
            run.failures.map((failure) => ({
              runId: run.runId,
              kind: failure.kind,
              stage: failure.stage,
              batchSequence: failure.batchSequence,
              message: failure.message,
              recordId: failure.recordId ?? null,
              recordTimestamp: failure.recordTimestamp ?? null,
              field: failure.field ?? null,
            })),
          );
        }
      });
      this.logger.log(
        `Audit persisted for run ${run.runId} (${run.status}, ${run.failures.length} failure(s))`,
      );
    } catch (error) {
      throw classifyTargetError(error, `Persisting audit for run ${run.runId}`);
    }
  }

  /** Run ids are UUIDs; anything else cannot be in the table */
  async findRun(runId: string): Promise<PipelineRun | null> {
    if (!UUID_PATTERN.test(runId)) return null;

    let record: PipelineRunRecord | null;
    try {
      record = await this.runRepository.findOne({
        where: { runId },
        relations: { failures: true },
      });
    } catch (error) {
      throw classifyTargetError(error, `Reading audit for run ${runId}`);
    }
    return record ? toPipelineRun(record) : null;
  }

  async listRuns(limit: number): Promise<PipelineRun[]> {
    let records: PipelineRunRecord[];
    try {
      records = await this.runRepository.find({
        order: { createdAt: 'DESC' },
        take: limit,
      });
    } catch (error) {
      throw classifyTargetError(error, 'Listing audited runs');
    }
    return records.map((record) => toPipelineRun({ ...record, failures: [] }));
  }
}

export function toPipelineRun(record: PipelineRunRecord): PipelineRun {
  return {
    runId: record.runId,
    windowStart: record.windowStart,
    windowEnd: record.windowEnd,
    status: parseStatus(record.status),
    recordsProcessed: record.recordsProcessed,
    recordsFailed: record.recordsFailed,
    batchesSucceeded: record.batchesSucceeded,
    batchesFailed: record.batchesFailed,
    cancelled: record.cancelled,
    createdAt: record.createdAt,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    failures: (record.failures ?? []).map(toRunFailure),
  };
}

function toRunFailure(record: RunFailureRecord): RunFailure {
  return {
    kind: parseKind(record.kind),
    stage: parseStage(record.stage),
    batchSequence: record.batchSequence,
    message: record.message,
    recordId: record.recordId,
    recordTimestamp: record.recordTimestamp,
    field: record.field,
  };
}

function parseStatus(value: string): RunStatus {
  const status = Object.values(RunStatus).find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown run status in audit table: ${value}`);
  }
  return status;
}

function parseStage(value: string): RunStage {
  switch (value) {
    case 'extract':
    case 'transform':
    case 'load':
    case 'aggregate':
      return value;
    default:
      throw new Error(`Unknown run stage in audit table: ${value}`);
  }
}

function parseKind(value: string): RunFailureKind {
  switch (value) {
    case 'InvalidWindow':
    case 'SourceUnavailable':
    case 'TargetUnavailable':
    case 'CorruptRecord':
    case 'ValidationError':
    case 'ConstraintViolation':
    case 'StoreUnavailable':
    case 'RunAlreadyActive':
    case 'RunNotFound':
    case 'ExportFailed':
    case 'Internal':
      return value;
    default:
      throw new Error(`Unknown failure kind in audit table: ${value}`);
  }
}
