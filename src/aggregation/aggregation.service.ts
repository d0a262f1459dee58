import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { And, DataSource, EntityManager, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Environment } from '../config/configuration';
import { TARGET_CONNECTION } from '../database/database.constants';
import { TargetReading } from '../database/entities/target-reading.entity';
import { Signal } from '../database/entities/signal.entity';
import { SignalValue } from '../database/entities/signal-value.entity';
import {
  classifyTargetError,
  ConstraintViolationError,
  TargetUnavailableError,
} from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';
import {
  AGGREGATE_STATISTICS,
  AGGREGATED_FIELDS,
  AggregatedField,
  AggregateStatistic,
  signalName,
} from './signal-catalogue';

export const AGGREGATION_INTERVAL_MINUTES = 10;

/** Rows per INSERT; three parameters each stays well under Postgres' 65535 bind limit */
export const AGGREGATE_UPSERT_CHUNK_SIZE = 5000;

type AggregatableReading = Pick<TargetReading, 'timestamp' | AggregatedField>;

/** One aggregated value before signal names are resolved to ids */
export interface AggregatePoint {
  intervalStart: Date;
  signal: string;
  value: number;
}

export interface AggregationResult {
  intervals: number;
  values: number;
}

/**
 * Floor a naive local timestamp to the start of its interval,
 * on local wall-clock fields.
 */
export function intervalStart(timestamp: Date, intervalMinutes: number): Date {
  const start = new Date(timestamp);
  start.setSeconds(0, 0);
  start.setMinutes(Math.floor(start.getMinutes() / intervalMinutes) * intervalMinutes);
  return start;
}

function statistic(values: number[], kind: AggregateStatistic): number | null {
  const n = values.length;
  if (n === 0) return null;
  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  switch (kind) {
    case 'mean':
      return mean;
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
    case 'std': {
      // Sample standard deviation; undefined for a single value
      if (n < 2) return null;
      const squared = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
      return Math.sqrt(squared / (n - 1));
    }
  }
}

/**
 * Pure core of the aggregation: bucket readings by interval and compute
 * mean/min/max/std per aggregated field. Nulls are skipped, never counted
 * as zero; a field with no values in an interval produces no points.
 * Output is ordered by interval, then catalogue order.
 */
export function aggregateReadings(
  readings: AggregatableReading[],
  intervalMinutes = AGGREGATION_INTERVAL_MINUTES,
): AggregatePoint[] {
  const buckets = new Map<number, { start: Date; values: Record<AggregatedField, number[]> }>();

  for (const reading of readings) {
    const start = intervalStart(reading.timestamp, intervalMinutes);
    const key = start.getTime();
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { start, values: { windSpeed: [], power: [] } };
      buckets.set(key, bucket);
    }
    for (const field of AGGREGATED_FIELDS) {
      const value = reading[field];
      if (value !== null) bucket.values[field].push(value);
    }
  }

  const points: AggregatePoint[] = [];
  const ordered = [...buckets.values()].sort((a, b) => a.start.getTime() - b.start.getTime());
  for (const bucket of ordered) {
    for (const field of AGGREGATED_FIELDS) {
      for (const kind of AGGREGATE_STATISTICS) {
        const value = statistic(bucket.values[field], kind);
        if (value !== null) {
          points.push({ intervalStart: bucket.start, signal: signalName(field, kind), value });
        }
      }
    }
  }
  return points;
}

/**
 * AggregationService - 10-minute signal aggregates in the target store.
 *
 * Reads loaded readings of one sensor in [start, end), aggregates them and
 * upserts `signal_data` on (timestamp, signal_id) in one transaction, so a
 * window can be aggregated again after a re-run.
 */
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);

  constructor(
    @InjectDataSource(TARGET_CONNECTION)
    private readonly targetDataSource: DataSource,
    @InjectRepository(TargetReading, TARGET_CONNECTION)
    private readonly readingRepository: Repository<TargetReading>,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  async aggregateWindow(
    windowStart: Date,
    windowEnd: Date,
    sensorId: string = this.configService.get('SENSOR_ID', { infer: true }),
    timeoutMs: number = this.configService.get('STORE_TIMEOUT_MS', { infer: true }),
  ): Promise<AggregationResult> {
    try {
      return await withTimeout(
        this.aggregate(windowStart, windowEnd, sensorId),
        timeoutMs,
        () => new TargetUnavailableError(`Aggregation timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      throw classifyTargetError(error, 'Aggregation failed');
    }
  }

  private async aggregate(
    windowStart: Date,
    windowEnd: Date,
    sensorId: string,
  ): Promise<AggregationResult> {
    const readings = await this.readingRepository.find({
      select: { timestamp: true, windSpeed: true, power: true },
      where: {
        sensorId,
        timestamp: And(MoreThanOrEqual(windowStart), LessThan(windowEnd)),
      },
      order: { timestamp: 'ASC' },
    });

    const points = aggregateReadings(readings);
    const intervals = new Set(points.map((point) => point.intervalStart.getTime())).size;

    if (points.length > 0) {
      await this.targetDataSource.transaction((manager) => this.upsertPoints(manager, points));
    }

    this.logger.log(
      `Aggregated ${readings.length} reading(s) into ${intervals} interval(s), ${points.length} value(s)`,
    );
    return { intervals, values: points.length };
  }

  private async upsertPoints(manager: EntityManager, points: AggregatePoint[]): Promise<void> {
    const signals = await manager.find(Signal);
    const signalIds = new Map(signals.map((signal) => [signal.name, signal.id]));

    const values: QueryDeepPartialEntity<SignalValue>[] = [];
    for (const point of points) {
      const signalId = signalIds.get(point.signal);
      if (signalId === undefined) {
        throw new ConstraintViolationError(
          `Signal '${point.signal}' missing from catalogue; run schema ensure first`,
        );
      }
      values.push({ timestamp: point.intervalStart, signalId, value: point.value });
    }

    for (let offset = 0; offset < values.length; offset += AGGREGATE_UPSERT_CHUNK_SIZE) {
      await manager
        .createQueryBuilder()
        .insert()
        .into(SignalValue)
        .values(values.slice(offset, offset + AGGREGATE_UPSERT_CHUNK_SIZE))
        .orUpdate(['value'], ['timestamp', 'signal_id'])
        .updateEntity(false)
        .execute();
    }
  }
}
