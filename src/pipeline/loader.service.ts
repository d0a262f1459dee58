import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Environment } from '../config/configuration';
import { TARGET_CONNECTION } from '../database/database.constants';
import { TargetReading } from '../database/entities/target-reading.entity';
import {
  classifyTargetError,
  TargetUnavailableError,
} from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';
import { LoadResult, TransformedReading } from './interfaces/pipeline.types';

/** Columns rewritten when the natural key already exists */
const UPSERT_COLUMNS = ['wind_speed', 'power', 'ambient_temperature', 'source_id'];
const CONFLICT_TARGET = ['sensor_id', 'timestamp'];

/**
 * LoaderService - writes a transformed batch into the target store.
 *
 * INSERT ... ON CONFLICT (sensor_id, timestamp) DO UPDATE, all chunks of a
 * batch inside one transaction: either the whole batch commits or nothing
 * does. Re-loading identical readings only produces updates.
 */
@Injectable()
export class LoaderService {
  private readonly logger = new Logger(LoaderService.name);
  private readonly chunkSize: number;

  constructor(
    @InjectDataSource(TARGET_CONNECTION)
    private readonly targetDataSource: DataSource,
    private readonly configService: ConfigService<Environment, true>,
  ) {
    this.chunkSize = this.configService.get('LOAD_CHUNK_SIZE', { infer: true });
  }

  async load(
    records: TransformedReading[],
    timeoutMs: number = this.configService.get('STORE_TIMEOUT_MS', { infer: true }),
  ): Promise<LoadResult> {
    if (records.length === 0) {
      return { inserted: 0, updated: 0, failed: 0 };
    }

    const unique = dedupeByNaturalKey(records);
    if (unique.length < records.length) {
      this.logger.warn(
        `Collapsed ${records.length - unique.length} duplicate key(s) within batch`,
      );
    }

    try {
      const inserted = await withTimeout(
        this.targetDataSource.transaction((manager) => this.upsertChunks(manager, unique)),
        timeoutMs,
        () => new TargetUnavailableError(`Target commit timed out after ${timeoutMs}ms`),
      );

      const result: LoadResult = {
        inserted,
        updated: unique.length - inserted,
        failed: 0,
      };
      this.logger.debug(
        `Loaded ${unique.length} reading(s): ${result.inserted} inserted, ${result.updated} updated`,
      );
      return result;
    } catch (error) {
      const classified = classifyTargetError(error, 'Batch load rolled back');
      this.logger.error(classified.message, {
        batchSize: unique.length,
        kind: classified.kind,
      });
      throw classified;
    }
  }

  private async upsertChunks(
    manager: EntityManager,
    records: TransformedReading[],
  ): Promise<number> {
    let inserted = 0;

    for (let offset = 0; offset < records.length; offset += this.chunkSize) {
      const chunk = records.slice(offset, offset + this.chunkSize);
      const values: QueryDeepPartialEntity<TargetReading>[] = chunk.map((record) => ({
        sensorId: record.sensorId,
        sourceId: record.sourceId,
        timestamp: record.timestamp,
        windSpeed: record.windSpeed,
        power: record.power,
        ambientTemperature: record.ambientTemperature,
      }));

      // xmax is 0 only for rows created by this statement
      const result = await manager
        .createQueryBuilder()
        .insert()
        .into(TargetReading)
        .values(values)
        .orUpdate(UPSERT_COLUMNS, CONFLICT_TARGET)
        .returning('(xmax = 0) AS inserted')
        .updateEntity(false)
        .execute();

      inserted += countInserted(result.raw);
    }

    return inserted;
  }
}

/** Last occurrence wins; Postgres rejects one statement touching a key twice */
export function dedupeByNaturalKey(records: TransformedReading[]): TransformedReading[] {
  const byKey = new Map<string, TransformedReading>();
  for (const record of records) {
    byKey.set(`${record.sensorId}|${record.timestamp.getTime()}`, record);
  }
  return [...byKey.values()];
}

function countInserted(raw: unknown): number {
  if (!Array.isArray(raw)) return 0;
  return raw.filter(
    (row: unknown) =>
      typeof row === 'object' && row !== null && Reflect.get(row, 'inserted') === true,
  ).length;
}
