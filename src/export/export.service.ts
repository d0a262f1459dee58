import { randomUUID } from 'crypto';
import { link, mkdir, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as XLSX from 'xlsx';
import { Environment } from '../config/configuration';
import {
  SOURCE_CONNECTION,
  StoreName,
  TARGET_CONNECTION,
} from '../database/database.constants';
import { SourceReading } from '../database/entities/source-reading.entity';
import { TargetReading } from '../database/entities/target-reading.entity';
import {
  errorMessage,
  ExportFailedError,
  StoreUnavailableError,
} from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';

export const EXPORT_COLUMNS = ['id', 'timestamp', 'wind_speed', 'power', 'ambient_temperature'];
export const EXPORT_SHEET_NAME = 'data';

type ExportedRow = Pick<
  SourceReading,
  'id' | 'timestamp' | 'windSpeed' | 'power' | 'ambientTemperature'
>;

/** YYYYMMDD_HHMMSS in local time */
export function exportTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `attempt` > 0 adds a counter for exports started within the same second */
export function exportFilename(store: StoreName, date: Date, attempt = 0): string {
  const suffix = attempt > 0 ? `_${attempt}` : '';
  return `${store}_data_${exportTimestamp(date)}${suffix}.xlsx`;
}

const MAX_NAME_ATTEMPTS = 100;

function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'EEXIST';
}

/**
 * Header row followed by one row per reading; nulls become empty cells.
 */
export function buildWorkbook(rows: ExportedRow[]): XLSX.WorkBook {
  const data: (string | number | Date | null)[][] = [
    EXPORT_COLUMNS,
    ...rows.map((row) => [
      row.id,
      row.timestamp,
      row.windSpeed,
      row.power,
      row.ambientTemperature,
    ]),
  ];
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(data, { cellDates: true }),
    EXPORT_SHEET_NAME,
  );
  return workbook;
}

/**
 * ExportService - snapshot of a store's `data` table as an .xlsx file.
 *
 * Read-only and independent of pipeline runs. The workbook is written to a
 * temporary file beside the target and hard-linked into place, so a failed
 * export never leaves a partial file and an existing export is never
 * replaced.
 */
@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    @InjectRepository(SourceReading, SOURCE_CONNECTION)
    private readonly sourceRepository: Repository<SourceReading>,
    @InjectRepository(TargetReading, TARGET_CONNECTION)
    private readonly targetRepository: Repository<TargetReading>,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  /** Returns the absolute path of the written file */
  async exportToSpreadsheet(store: StoreName, now: Date = new Date()): Promise<string> {
    const rows = await this.readAll(store);
    this.logger.log(`Exporting ${rows.length} row(s) from ${store} store`);

    const outputDir = path.resolve(this.configService.get('EXPORT_DIR', { infer: true }));
    const tempPath = path.join(outputDir, `.${store}_export_${randomUUID()}.tmp`);

    let finalPath: string;
    let tempCreated = false;
    try {
      await mkdir(outputDir, { recursive: true });
      const buffer: Buffer = XLSX.write(buildWorkbook(rows), {
        type: 'buffer',
        bookType: 'xlsx',
      });
      tempCreated = true;
      await writeFile(tempPath, buffer);
      finalPath = await this.claimFilename(tempPath, outputDir, store, now);
    } catch (error) {
      this.logger.error(`Export of ${store} store failed: ${errorMessage(error)}`);
      throw new ExportFailedError(
        `Writing ${store} export to ${outputDir} failed: ${errorMessage(error)}`,
        error,
      );
    } finally {
      if (tempCreated) await rm(tempPath, { force: true });
    }

    this.logger.log(`Export written to ${finalPath}`);
    return finalPath;
  }

  /** Links the temp file under the first free name; link() fails instead of overwriting */
  private async claimFilename(
    tempPath: string,
    outputDir: string,
    store: StoreName,
    now: Date,
  ): Promise<string> {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const candidate = path.join(outputDir, exportFilename(store, now, attempt));
      try {
        await link(tempPath, candidate);
        return candidate;
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }
    throw new Error(`No free export filename after ${MAX_NAME_ATTEMPTS} attempts`);
  }

  private async readAll(store: StoreName): Promise<ExportedRow[]> {
    const timeoutMs = this.configService.get('STORE_TIMEOUT_MS', { infer: true });
    const select = {
      id: true,
      timestamp: true,
      windSpeed: true,
      power: true,
      ambientTemperature: true,
    } as const;
    const order = { timestamp: 'ASC', id: 'ASC' } as const;
    const query: Promise<ExportedRow[]> =
      store === SOURCE_CONNECTION
        ? this.sourceRepository.find({ select, order })
        : this.targetRepository.find({ select, order });

    try {
      return await withTimeout(
        query,
        timeoutMs,
        () => new StoreUnavailableError(`Reading ${store} store timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      throw new StoreUnavailableError(
        `Reading ${store} store failed: ${errorMessage(error)}`,
        error,
      );
    }
  }
}
