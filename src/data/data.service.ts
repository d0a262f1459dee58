import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import {
  And,
  FindOperator,
  LessThan,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { Environment } from '../config/configuration';
import { SOURCE_CONNECTION } from '../database/database.constants';
import { SourceReading } from '../database/entities/source-reading.entity';
import {
  errorMessage,
  SourceUnavailableError,
  ValidationError,
} from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';

export const DATA_VARIABLES = ['timestamp', 'wind_speed', 'power', 'ambient_temperature'] as const;
export type DataVariable = (typeof DATA_VARIABLES)[number];

const FIELD_BY_VARIABLE = {
  timestamp: 'timestamp',
  wind_speed: 'windSpeed',
  power: 'power',
  ambient_temperature: 'ambientTemperature',
} as const satisfies Record<DataVariable, keyof SourceReading>;

export type DataRow = Partial<Record<DataVariable, Date | number | null>>;

export interface DataInfo {
  count: number;
  earliest: Date | null;
  latest: Date | null;
}

function isDataVariable(value: string): value is DataVariable {
  return DATA_VARIABLES.some((variable) => variable === value);
}

/**
 * Parse a comma list of column names. Empty or missing means all columns;
 * duplicates are dropped, order of first mention is kept.
 */
export function parseVariables(raw: string | undefined): DataVariable[] {
  if (raw === undefined || raw.trim() === '') return [...DATA_VARIABLES];

  const variables: DataVariable[] = [];
  for (const name of raw.split(',').map((part) => part.trim())) {
    if (!isDataVariable(name)) {
      throw new ValidationError(
        'variables',
        `unknown variable '${name}', expected ${DATA_VARIABLES.join(', ')}`,
      );
    }
    if (!variables.includes(name)) variables.push(name);
  }
  return variables;
}

function timestampFilter(start?: Date, end?: Date): FindOperator<Date> | undefined {
  if (start && end) return And(MoreThanOrEqual(start), LessThan(end));
  if (start) return MoreThanOrEqual(start);
  if (end) return LessThan(end);
  return undefined;
}

/**
 * DataService - read access to the source store for ad-hoc inspection.
 */
@Injectable()
export class DataService {
  private readonly logger = new Logger(DataService.name);

  constructor(
    @InjectRepository(SourceReading, SOURCE_CONNECTION)
    private readonly readingRepository: Repository<SourceReading>,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  /** Readings in [start, end), ordered by timestamp, projected to the requested columns */
  async getReadings(
    variables: DataVariable[],
    start?: Date,
    end?: Date,
  ): Promise<DataRow[]> {
    const timestamp = timestampFilter(start, end);
    const readings = await this.guard(
      'Reading source data',
      this.readingRepository.find({
        where: timestamp ? { timestamp } : {},
        order: { timestamp: 'ASC', id: 'ASC' },
      }),
    );

    this.logger.debug(`Returning ${readings.length} reading(s) with ${variables.join(',')}`);
    return readings.map((reading) => {
      const row: DataRow = {};
      for (const variable of variables) {
        row[variable] = reading[FIELD_BY_VARIABLE[variable]];
      }
      return row;
    });
  }

  async getInfo(): Promise<DataInfo> {
    const raw = await this.guard(
      'Reading source data info',
      this.readingRepository
        .createQueryBuilder('reading')
        .select('COUNT(*)', 'count')
        .addSelect('MIN(reading.timestamp)', 'earliest')
        .addSelect('MAX(reading.timestamp)', 'latest')
        .getRawOne<{ count: string | number; earliest: Date | null; latest: Date | null }>(),
    );

    return {
      count: Number(raw?.count ?? 0),
      earliest: raw?.earliest ?? null,
      latest: raw?.latest ?? null,
    };
  }

  async getCount(): Promise<number> {
    return this.guard('Counting source data', this.readingRepository.count());
  }

  private async guard<T>(operation: string, query: Promise<T>): Promise<T> {
    const timeoutMs = this.configService.get('STORE_TIMEOUT_MS', { infer: true });
    try {
      return await withTimeout(
        query,
        timeoutMs,
        () => new SourceUnavailableError(`${operation} timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(`${operation} failed: ${errorMessage(error)}`, error);
    }
  }
}
