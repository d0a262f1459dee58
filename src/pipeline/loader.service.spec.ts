import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getDataSourceToken } from '@nestjs/typeorm';
import { dedupeByNaturalKey, LoaderService } from './loader.service';
import { TARGET_CONNECTION } from '../database/database.constants';
import {
  ConstraintViolationError,
  TargetUnavailableError,
} from '../common/errors/pipeline.errors';
import { createConfigServiceMock } from '../../test/utils/test-config';
import { createTransformedReading } from '../../test/utils/mock-readings';

describe('LoaderService', () => {
  let service: LoaderService;
  let insertBuilder: Record<string, jest.Mock>;
  let mockDataSource: { transaction: jest.Mock };

  beforeEach(async () => {
    insertBuilder = {
      insert: jest.fn().mockReturnThis(),
      into: jest.fn().mockReturnThis(),
      values: jest.fn().mockReturnThis(),
      orUpdate: jest.fn().mockReturnThis(),
      returning: jest.fn().mockReturnThis(),
      updateEntity: jest.fn().mockReturnThis(),
      execute: jest.fn().mockResolvedValue({ raw: [] }),
    };
    const manager = { createQueryBuilder: jest.fn(() => insertBuilder) };
    mockDataSource = {
      transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LoaderService,
        { provide: getDataSourceToken(TARGET_CONNECTION), useValue: mockDataSource },
        { provide: ConfigService, useValue: createConfigServiceMock({ LOAD_CHUNK_SIZE: '2' }) },
      ],
    }).compile();

    service = module.get<LoaderService>(LoaderService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should not open a transaction for an empty batch', async () => {
    await expect(service.load([])).resolves.toEqual({ inserted: 0, updated: 0, failed: 0 });
    expect(mockDataSource.transaction).not.toHaveBeenCalled();
  });

  it('should upsert on (sensor_id, timestamp) in chunks inside one transaction', async () => {
    insertBuilder.execute
      .mockResolvedValueOnce({ raw: [{ inserted: true }, { inserted: false }] })
      .mockResolvedValueOnce({ raw: [{ inserted: true }] });
    const records = [0, 1, 2].map((minute) => createTransformedReading(minute));

    const result = await service.load(records);

    expect(result).toEqual({ inserted: 2, updated: 1, failed: 0 });
    expect(mockDataSource.transaction).toHaveBeenCalledTimes(1);
    expect(insertBuilder.execute).toHaveBeenCalledTimes(2);
    expect(insertBuilder.orUpdate).toHaveBeenCalledWith(
      ['wind_speed', 'power', 'ambient_temperature', 'source_id'],
      ['sensor_id', 'timestamp'],
    );
    expect(insertBuilder.values).toHaveBeenNthCalledWith(1, [
      {
        sensorId: 'default',
        sourceId: 1,
        timestamp: records[0].timestamp,
        windSpeed: 6.5,
        power: 850,
        ambientTemperature: 14.2,
      },
      expect.objectContaining({ sourceId: 2 }),
    ]);
  });

  it('should collapse duplicate keys within a batch before writing', async () => {
    insertBuilder.execute.mockResolvedValueOnce({ raw: [{ inserted: true }] });
    const records = [
      createTransformedReading(0, { power: 100 }),
      createTransformedReading(0, { power: 200 }),
    ];

    const result = await service.load(records);

    expect(result).toEqual({ inserted: 1, updated: 0, failed: 0 });
    expect(insertBuilder.values).toHaveBeenCalledWith([expect.objectContaining({ power: 200 })]);
  });

  it('should classify a lost connection as TargetUnavailable', async () => {
    insertBuilder.execute.mockRejectedValueOnce(new Error('Connection terminated unexpectedly'));

    const error: unknown = await service.load([createTransformedReading(0)]).catch((e) => e);

    expect(error).toBeInstanceOf(TargetUnavailableError);
    expect(error).toMatchObject({
      message: 'Batch load rolled back: Connection terminated unexpectedly',
      retryable: true,
    });
  });

  it('should classify a check violation as ConstraintViolation', async () => {
    mockDataSource.transaction.mockRejectedValueOnce(
      Object.assign(new Error('new row violates check constraint'), { code: '23514' }),
    );

    await expect(service.load([createTransformedReading(0)])).rejects.toBeInstanceOf(
      ConstraintViolationError,
    );
  });

  it('should give up waiting once the commit times out', async () => {
    mockDataSource.transaction.mockReturnValueOnce(new Promise(() => undefined));

    await expect(service.load([createTransformedReading(0)], 10)).rejects.toThrow(
      'Target commit timed out after 10ms',
    );
  });
});

describe('dedupeByNaturalKey', () => {
  it('should keep the last occurrence per sensor and timestamp', () => {
    const records = [
      createTransformedReading(0, { sourceId: 1 }),
      createTransformedReading(1, { sourceId: 2 }),
      createTransformedReading(0, { sourceId: 3 }),
      createTransformedReading(0, { sensorId: 'other', sourceId: 4 }),
    ];

    expect(dedupeByNaturalKey(records).map((record) => record.sourceId)).toEqual([3, 2, 4]);
  });
});
