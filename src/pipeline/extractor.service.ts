import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Environment } from '../config/configuration';
import { SOURCE_CONNECTION } from '../database/database.constants';
import { SourceReading } from '../database/entities/source-reading.entity';
import {
  CorruptRecordError,
  errorMessage,
  InvalidWindowError,
  PipelineError,
  SourceUnavailableError,
} from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';
import { Batch, SensorReading } from './interfaces/pipeline.types';

/**
 * Raw row as selected from the source; pg may hand numerics back as strings.
 * `cursor_key` is the timestamp rendered by Postgres as text, which keeps the
 * column's microseconds where a JS Date keeps milliseconds.
 */
export interface RawReadingRow {
  id: unknown;
  timestamp: unknown;
  cursor_key: unknown;
  wind_speed: unknown;
  power: unknown;
  ambient_temperature: unknown;
}

/** Position after the last row of the previous page, in store precision */
export interface KeysetCursor {
  timestamp: string;
  id: number;
}

/** Fetches one page strictly after `cursor` (or from the window start) */
export type PageFetcher = (cursor: KeysetCursor | null) => Promise<RawReadingRow[]>;

export function assertValidWindow(windowStart: Date, windowEnd: Date): void {
  if (Number.isNaN(windowStart.getTime()) || Number.isNaN(windowEnd.getTime())) {
    throw new InvalidWindowError('Window bounds must be valid dates');
  }
  if (windowStart.getTime() > windowEnd.getTime()) {
    throw new InvalidWindowError(
      `Window start ${windowStart.toISOString()} is after window end ${windowEnd.toISOString()}`,
    );
  }
}

/**
 * Lazy, finite, restartable sequence of batches over one window.
 *
 * `next()` moves the cursor only after a page was fetched, so a call that
 * failed with SourceUnavailable can be repeated and returns the same batch.
 * Every `for await` starts a fresh pass from the window start.
 */
export class ExtractionStream implements AsyncIterable<Batch> {
  private cursor: KeysetCursor | null = null;
  private sequence = 0;
  private exhausted = false;

  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly batchSize: number,
    private readonly onCorrupt: (error: CorruptRecordError) => void = () => undefined,
  ) {}

  get done(): boolean {
    return this.exhausted;
  }

  /** Resolves to the next batch, or null once the window is exhausted */
  async next(): Promise<Batch | null> {
    if (this.exhausted) return null;

    const rows = await this.fetchPage(this.cursor);
    const readings: SensorReading[] = [];
    const corrupt: CorruptRecordError[] = [];
    let lastKey: KeysetCursor | null = null;

    for (const row of rows) {
      const parsed = parseReadingRow(row);
      if (parsed.key) lastKey = parsed.key;
      if (parsed.reading) {
        readings.push(parsed.reading);
      } else if (parsed.error) {
        corrupt.push(parsed.error);
        this.onCorrupt(parsed.error);
      }
    }

    // A short page is the last one; a page with no usable key cannot move the cursor
    if (rows.length < this.batchSize || !lastKey) {
      this.exhausted = true;
    } else {
      this.cursor = lastKey;
    }

    if (rows.length === 0) return null;

    return { sequence: this.sequence++, readings, corrupt };
  }

  [Symbol.asyncIterator](): AsyncIterator<Batch> {
    const pass = new ExtractionStream(this.fetchPage, this.batchSize, this.onCorrupt);
    return {
      next: async (): Promise<IteratorResult<Batch>> => {
        const batch = await pass.next();
        return batch ? { value: batch, done: false } : { value: undefined, done: true };
      },
    };
  }
}

/**
 * ExtractorService - reads source readings in [windowStart, windowEnd).
 *
 * Keyset pagination on (timestamp, id): each page is one range scan on
 * idx_data_timestamp, starting strictly after the last row of the previous
 * page.
 */
@Injectable()
export class ExtractorService {
  private readonly logger = new Logger(ExtractorService.name);

  constructor(
    @InjectRepository(SourceReading, SOURCE_CONNECTION)
    private readonly sourceRepository: Repository<SourceReading>,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  extract(
    windowStart: Date,
    windowEnd: Date,
    batchSize: number,
    timeoutMs: number = this.configService.get('STORE_TIMEOUT_MS', { infer: true }),
  ): ExtractionStream {
    assertValidWindow(windowStart, windowEnd);
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }

    const fetchPage: PageFetcher = (cursor) =>
      this.fetchPage(windowStart, windowEnd, batchSize, cursor, timeoutMs);

    return new ExtractionStream(fetchPage, batchSize, (error) =>
      this.logger.warn(error.message),
    );
  }

  private async fetchPage(
    windowStart: Date,
    windowEnd: Date,
    batchSize: number,
    cursor: KeysetCursor | null,
    timeoutMs: number,
  ): Promise<RawReadingRow[]> {
    const query = this.sourceRepository
      .createQueryBuilder('reading')
      .select('reading.id', 'id')
      .addSelect('reading.timestamp', 'timestamp')
      .addSelect('CAST(reading.timestamp AS text)', 'cursor_key')
      .addSelect('reading.windSpeed', 'wind_speed')
      .addSelect('reading.power', 'power')
      .addSelect('reading.ambientTemperature', 'ambient_temperature')
      .where('reading.timestamp >= :windowStart', { windowStart })
      .andWhere('reading.timestamp < :windowEnd', { windowEnd });

    if (cursor) {
      query.andWhere(
        '(reading.timestamp, reading.id) > (CAST(:cursorTimestamp AS timestamp), :cursorId)',
        {
          cursorTimestamp: cursor.timestamp,
          cursorId: cursor.id,
        },
      );
    }

    query
      .orderBy('reading.timestamp', 'ASC')
      .addOrderBy('reading.id', 'ASC')
      .limit(batchSize);

    this.logger.debug(
      `Fetching page of ${batchSize} after ${cursor ? `${cursor.timestamp}#${cursor.id}` : 'window start'}`,
    );

    try {
      return await withTimeout(
        query.getRawMany<RawReadingRow>(),
        timeoutMs,
        () => new SourceUnavailableError(`Source query timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new SourceUnavailableError(`Source query failed: ${errorMessage(error)}`, error);
    }
  }
}

interface ParsedRow {
  reading?: SensorReading;
  error?: CorruptRecordError;
  key?: KeysetCursor;
}

/**
 * Validate a raw row against the reading invariants.
 * Returns the keyset position whenever id and cursor key are usable, even
 * for a corrupt row, so paging continues past it.
 */
export function parseReadingRow(row: RawReadingRow): ParsedRow {
  const id = toInteger(row.id);
  const timestamp = toDate(row.timestamp);
  const cursorKey =
    typeof row.cursor_key === 'string' && row.cursor_key !== '' ? row.cursor_key : null;
  const key = id !== null && cursorKey !== null ? { id, timestamp: cursorKey } : undefined;

  if (id === null) {
    return { key, error: new CorruptRecordError(null, timestamp, 'missing id') };
  }
  if (!timestamp) {
    return { key, error: new CorruptRecordError(id, null, 'missing or invalid timestamp') };
  }

  const fields = {
    wind_speed: toNullableNumber(row.wind_speed),
    power: toNullableNumber(row.power),
    ambient_temperature: toNullableNumber(row.ambient_temperature),
  };
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) {
      return {
        key,
        error: new CorruptRecordError(id, timestamp, `${name} is not a finite number`),
      };
    }
  }

  return {
    key,
    reading: {
      id,
      timestamp,
      windSpeed: fields.wind_speed ?? null,
      power: fields.power ?? null,
      ambientTemperature: fields.ambient_temperature ?? null,
    },
  };
}

function toInteger(value: unknown): number | null {
  const numeric = typeof value === 'string' ? Number(value) : value;
  return typeof numeric === 'number' && Number.isInteger(numeric) ? numeric : null;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/** null stays null; undefined signals a value that is present but unusable */
function toNullableNumber(value: unknown): number | null | undefined {
  if (value === null || value === undefined) return null;
  const numeric = typeof value === 'string' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return undefined;
  return numeric;
}
