import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { dayWindow, PipelineService } from './pipeline.service';
import { ExtractorService } from './extractor.service';
import { TransformerService } from './transformer.service';
import { LoaderService } from './loader.service';
import { RunRegistry } from './run-registry.service';
import { RunAuditService } from './run-audit.service';
import { AggregationService } from '../aggregation/aggregation.service';
import {
  ConstraintViolationError,
  InvalidWindowError,
  RunAlreadyActiveError,
  RunNotFoundError,
  TargetUnavailableError,
} from '../common/errors/pipeline.errors';
import { PipelineRun, RunStatus } from './interfaces/pipeline.types';
import { createConfigServiceMock } from '../../test/utils/test-config';
import {
  createRawRow,
  createRawRows,
  minutesAfterBase,
} from '../../test/utils/mock-readings';
import { InMemorySource, InMemoryTarget } from '../../test/utils/in-memory-stores';

describe('PipelineService', () => {
  const windowStart = minutesAfterBase(0);
  const windowEnd = minutesAfterBase(60);

  let service: PipelineService;
  let source: InMemorySource;
  let target: InMemoryTarget;
  let aggregation: { aggregateWindow: jest.Mock };
  let audit: { persist: jest.Mock; findRun: jest.Mock; listRuns: jest.Mock };

  async function createService(
    rows = createRawRows(25),
    env: Record<string, string> = {},
  ): Promise<void> {
    source = new InMemorySource(rows);
    target = new InMemoryTarget();
    aggregation = {
      aggregateWindow: jest.fn().mockResolvedValue({ intervals: 3, values: 24 }),
    };
    audit = {
      persist: jest.fn().mockResolvedValue(undefined),
      findRun: jest.fn().mockResolvedValue(null),
      listRuns: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PipelineService,
        RunRegistry,
        TransformerService,
        { provide: ExtractorService, useValue: source },
        { provide: LoaderService, useValue: target },
        { provide: AggregationService, useValue: aggregation },
        { provide: RunAuditService, useValue: audit },
        {
          provide: ConfigService,
          useValue: createConfigServiceMock({
            BATCH_SIZE: '10',
            AGGREGATION_ENABLED: 'false',
            ...env,
          }),
        },
      ],
    }).compile();

    service = module.get<PipelineService>(PipelineService);
  }

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('runPipeline', () => {
    beforeEach(async () => {
      await createService();
    });

    it('should move every reading of the window into the target', async () => {
      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run).toMatchObject({
        status: RunStatus.Succeeded,
        recordsProcessed: 25,
        recordsFailed: 0,
        batchesSucceeded: 3,
        batchesFailed: 0,
        cancelled: false,
        failures: [],
      });
      expect(run.startedAt).toBeInstanceOf(Date);
      expect(run.finishedAt).toBeInstanceOf(Date);
      expect(target.snapshot().map((reading) => reading.sourceId)).toEqual(
        Array.from({ length: 25 }, (_, i) => i + 1),
      );
    });

    it('should leave the target unchanged when the same window runs again', async () => {
      await service.runPipeline(windowStart, windowEnd);
      const before = target.snapshot();

      const again = await service.runPipeline(windowStart, windowEnd);

      expect(again.status).toBe(RunStatus.Succeeded);
      expect(again.recordsProcessed).toBe(25);
      expect(target.snapshot()).toEqual(before);
    });

    it('should load the remaining readings when one fails validation', async () => {
      await createService([
        ...createRawRows(4),
        createRawRow(4, { wind_speed: -1 }),
        ...createRawRows(10).slice(5),
      ]);

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Succeeded);
      expect(run.recordsProcessed).toBe(9);
      expect(run.recordsFailed).toBe(1);
      expect(run.failures).toEqual([
        {
          kind: 'ValidationError',
          stage: 'transform',
          batchSequence: 0,
          message: 'Invalid wind_speed: -1 m/s outside [0, 75]',
          recordId: 5,
          recordTimestamp: minutesAfterBase(4),
          field: 'wind_speed',
        },
      ]);
      expect(target.rows.size).toBe(9);
    });

    it('should record corrupt source rows without loading them', async () => {
      await createService([createRawRow(0), createRawRow(1, { power: 'n/a' })]);

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Succeeded);
      expect(run.recordsProcessed).toBe(1);
      expect(run.recordsFailed).toBe(1);
      expect(run.failures[0]).toMatchObject({ kind: 'CorruptRecord', stage: 'extract', recordId: 2 });
    });

    it('should succeed with nothing to do on an empty window', async () => {
      const run = await service.runPipeline(minutesAfterBase(500), minutesAfterBase(600));

      expect(run.status).toBe(RunStatus.Succeeded);
      expect(run.recordsProcessed).toBe(0);
      expect(target.loadCalls).toBe(0);
    });

    it('should reject an inverted window before registering a run', async () => {
      await expect(service.runPipeline(windowEnd, windowStart)).rejects.toBeInstanceOf(
        InvalidWindowError,
      );
      await expect(service.listRuns()).resolves.toEqual([]);
    });

    it('should persist the terminal run to the audit table', async () => {
      const run = await service.runPipeline(windowStart, windowEnd);

      expect(audit.persist).toHaveBeenCalledTimes(1);
      expect(audit.persist).toHaveBeenCalledWith(run);
    });

    it('should keep the outcome when the audit cannot be written', async () => {
      audit.persist.mockRejectedValueOnce(new TargetUnavailableError('down'));

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Succeeded);
    });
  });

  describe('connectivity faults', () => {
    it('should fail the run when the source stays unavailable', async () => {
      await createService();
      source.down = true;

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Failed);
      expect(run.batchesFailed).toBe(1);
      expect(run.failures).toEqual([
        {
          kind: 'SourceUnavailable',
          stage: 'extract',
          batchSequence: 0,
          message: 'connection refused',
        },
      ]);
      expect(source.fetchAttempts).toBe(3);
      expect(target.rows.size).toBe(0);
    });

    it('should retry a transient source failure and resume at the same batch', async () => {
      await createService();
      source.failNextFetches(2);

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Succeeded);
      expect(run.recordsProcessed).toBe(25);
      expect(source.fetchAttempts).toBe(5);
    });

    it('should abort at the first batch the target rejects after retries', async () => {
      await createService();
      target.failNextLoads(3);

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run).toMatchObject({
        status: RunStatus.Failed,
        recordsProcessed: 0,
        recordsFailed: 10,
        batchesSucceeded: 0,
        batchesFailed: 1,
      });
      expect(run.failures).toEqual([
        { kind: 'TargetUnavailable', stage: 'load', batchSequence: 0, message: 'connection reset' },
      ]);
      expect(target.loadCalls).toBe(3);
      expect(source.pagesServed).toBe(1);
    });

    it('should carry on past a failed batch when configured to', async () => {
      await createService(createRawRows(25), { CONTINUE_ON_BATCH_FAILURE: 'true' });
      target.failNextLoads(3);

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run).toMatchObject({
        status: RunStatus.PartiallyFailed,
        recordsProcessed: 15,
        recordsFailed: 10,
        batchesSucceeded: 2,
        batchesFailed: 1,
      });
      expect(target.snapshot().map((reading) => reading.sourceId)).toEqual(
        Array.from({ length: 15 }, (_, i) => i + 11),
      );
    });

    it('should not retry a constraint violation', async () => {
      await createService();
      target.failNextLoads(1, new ConstraintViolationError('value out of range (SQLSTATE 22003)'));

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Failed);
      expect(target.loadCalls).toBe(1);
      expect(run.failures[0].kind).toBe('ConstraintViolation');
    });

    it('should honour per-run attempt overrides', async () => {
      await createService();
      source.down = true;

      await service.runPipeline(windowStart, windowEnd, { maxAttempts: 5 });

      expect(source.fetchAttempts).toBe(5);
    });

    it('should record an unexpected error as Internal and fail the run', async () => {
      await createService();
      jest.spyOn(target, 'load').mockRejectedValueOnce(new TypeError('undefined is not a function'));

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.Failed);
      expect(run.failures).toEqual([
        {
          kind: 'Internal',
          stage: 'transform',
          batchSequence: null,
          message: 'undefined is not a function',
        },
      ]);
    });
  });

  describe('aggregation', () => {
    it('should aggregate the window after a run with loaded batches', async () => {
      await createService(createRawRows(25), { AGGREGATION_ENABLED: 'true' });

      const run = await service.runPipeline(windowStart, windowEnd, { sensorId: 'turbine-07' });

      expect(run.status).toBe(RunStatus.Succeeded);
      expect(aggregation.aggregateWindow).toHaveBeenCalledWith(
        windowStart,
        windowEnd,
        'turbine-07',
        1000,
      );
    });

    it('should mark the run partially failed when aggregation fails', async () => {
      await createService(createRawRows(25), { AGGREGATION_ENABLED: 'true' });
      aggregation.aggregateWindow.mockRejectedValue(new ConstraintViolationError('missing signal'));

      const run = await service.runPipeline(windowStart, windowEnd);

      expect(run.status).toBe(RunStatus.PartiallyFailed);
      expect(run.recordsProcessed).toBe(25);
      expect(run.failures).toEqual([
        {
          kind: 'ConstraintViolation',
          stage: 'aggregate',
          batchSequence: null,
          message: 'missing signal',
        },
      ]);
    });

    it('should skip aggregation when nothing was loaded', async () => {
      await createService([], { AGGREGATION_ENABLED: 'true' });

      await service.runPipeline(windowStart, windowEnd);

      expect(aggregation.aggregateWindow).not.toHaveBeenCalled();
    });
  });

  describe('startPipeline', () => {
    beforeEach(async () => {
      await createService();
    });

    it('should return the running snapshot and finish in the background', async () => {
      const started = service.startPipeline(windowStart, windowEnd);

      expect(started.status).toBe(RunStatus.Running);
      const finished = await service.waitForRun(started.runId);
      expect(finished.status).toBe(RunStatus.Succeeded);
      expect(finished.runId).toBe(started.runId);
    });

    it('should refuse a second run on an overlapping window while the first is active', async () => {
      const first = service.startPipeline(windowStart, windowEnd);

      await expect(
        service.runPipeline(minutesAfterBase(30), minutesAfterBase(90)),
      ).rejects.toBeInstanceOf(RunAlreadyActiveError);

      await service.waitForRun(first.runId);
      const second = await service.runPipeline(minutesAfterBase(30), minutesAfterBase(90));
      expect(second.status).toBe(RunStatus.Succeeded);
    });

    it('should run disjoint windows concurrently', async () => {
      const runs = await Promise.all([
        service.runPipeline(minutesAfterBase(0), minutesAfterBase(10)),
        service.runPipeline(minutesAfterBase(10), minutesAfterBase(25)),
      ]);

      expect(runs.map((run: PipelineRun) => run.recordsProcessed)).toEqual([10, 15]);
      expect(target.rows.size).toBe(25);
    });

    it('should stop at the next batch boundary once cancelled', async () => {
      const started = service.startPipeline(windowStart, windowEnd);
      service.cancelRun(started.runId);

      const run = await service.waitForRun(started.runId);

      // The first batch was already in flight when the request arrived
      expect(run.cancelled).toBe(true);
      expect(run.status).toBe(RunStatus.PartiallyFailed);
      expect(run.batchesSucceeded).toBe(1);
      expect(target.rows.size).toBe(10);
    });
  });

  describe('run lookup', () => {
    beforeEach(async () => {
      await createService();
    });

    it('should prefer the live registry over the audit table', async () => {
      const run = await service.runPipeline(windowStart, windowEnd);

      await expect(service.getRun(run.runId)).resolves.toEqual(run);
      expect(audit.findRun).not.toHaveBeenCalled();
    });

    it('should fall back to the audit table', async () => {
      const stored = { runId: 'archived' };
      audit.findRun.mockResolvedValue(stored);

      await expect(service.getRun('archived')).resolves.toBe(stored);
    });

    it('should report an unknown run', async () => {
      await expect(service.getRun('missing')).rejects.toBeInstanceOf(RunNotFoundError);
      expect(() => service.cancelRun('missing')).toThrow(RunNotFoundError);
    });

    it('should list live and audited runs newest first without duplicates', async () => {
      const live = await service.runPipeline(windowStart, windowEnd);
      const archived = { ...live, runId: 'archived', createdAt: new Date(2000, 0, 1) };
      audit.listRuns.mockResolvedValue([live, archived]);

      const runs = await service.listRuns(10);

      expect(runs.map((run) => run.runId)).toEqual([live.runId, 'archived']);
      expect(audit.listRuns).toHaveBeenCalledWith(10);
    });

    it('should run a whole calendar day', async () => {
      const run = await service.runForDate('2024-06-01');

      expect(run.windowStart).toEqual(new Date(2024, 5, 1));
      expect(run.windowEnd).toEqual(new Date(2024, 5, 2));
      expect(run.recordsProcessed).toBe(25);
    });
  });
});

describe('dayWindow', () => {
  it('should span midnight to midnight in local time', () => {
    expect(dayWindow('2024-12-31')).toEqual({
      windowStart: new Date(2024, 11, 31),
      windowEnd: new Date(2025, 0, 1),
    });
  });

  it.each(['2024-02-30', '2024-13-01', '01/06/2024'])('should reject %s', (date) => {
    expect(() => dayWindow(date)).toThrow(InvalidWindowError);
  });
});
