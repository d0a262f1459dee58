import { SourceUnavailableError, TargetUnavailableError } from '../../src/common/errors/pipeline.errors';
import {
  ExtractionStream,
  PageFetcher,
  RawReadingRow,
} from '../../src/pipeline/extractor.service';
import { LoadResult, TransformedReading } from '../../src/pipeline/interfaces/pipeline.types';

function rowTime(row: RawReadingRow): number {
  return row.timestamp instanceof Date ? row.timestamp.getTime() : Number.NaN;
}

function rowId(row: RawReadingRow): number {
  return typeof row.id === 'number' ? row.id : Number.NaN;
}

function rowKey(row: RawReadingRow): string {
  return typeof row.cursor_key === 'string' ? row.cursor_key : '';
}

/** Keyset order on the store-precision key; the fixed-width text sorts chronologically */
function compareRows(a: RawReadingRow, b: RawReadingRow): number {
  const [keyA, keyB] = [rowKey(a), rowKey(b)];
  if (keyA !== keyB) return keyA < keyB ? -1 : 1;
  return rowId(a) - rowId(b);
}

/**
 * Source store stand-in with the same keyset paging as ExtractorService:
 * rows in [start, end), strictly after the cursor, ordered by (timestamp, id).
 * Implements the `extract` method the orchestrator calls.
 */
export class InMemorySource {
  pagesServed = 0;
  fetchAttempts = 0;
  /** Every fetch rejects while true */
  down = false;
  private failures: Error[] = [];

  constructor(private readonly rows: RawReadingRow[]) {}

  private gate: Promise<void> | null = null;

  /** Holds every fetch until the returned release function is called */
  pause(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  /** The next `count` page fetches reject before reading anything */
  failNextFetches(count: number, error: Error = new SourceUnavailableError('connection refused')): void {
    this.failures.push(...Array.from({ length: count }, () => error));
  }


  extract(windowStart: Date, windowEnd: Date, batchSize: number): ExtractionStream {
    const fetchPage: PageFetcher = async (cursor) => {
      if (this.gate) await this.gate;
      this.fetchAttempts++;
      if (this.down) throw new SourceUnavailableError('connection refused');
      const failure = this.failures.shift();
      if (failure) throw failure;

      const page = this.rows
        .filter((row) => rowTime(row) >= windowStart.getTime() && rowTime(row) < windowEnd.getTime())
        .filter(
          (row) =>
            !cursor ||
            rowKey(row) > cursor.timestamp ||
            (rowKey(row) === cursor.timestamp && rowId(row) > cursor.id),
        )
        .sort(compareRows)
        .slice(0, batchSize);
      this.pagesServed++;
      return page;
    };
    return new ExtractionStream(fetchPage, batchSize);
  }
}

/**
 * Target store stand-in keyed on (sensor_id, timestamp), with the loader's
 * contract: a batch commits whole or not at all.
 */
export class InMemoryTarget {
  readonly rows = new Map<string, TransformedReading>();
  loadCalls = 0;
  private failures: Error[] = [];

  failNextLoads(count: number, error: Error = new TargetUnavailableError('connection reset')): void {
    this.failures.push(...Array.from({ length: count }, () => error));
  }

  async load(records: TransformedReading[]): Promise<LoadResult> {
    this.loadCalls++;
    const failure = this.failures.shift();
    if (failure) throw failure;

    let inserted = 0;
    let updated = 0;
    for (const record of records) {
      const key = `${record.sensorId}|${record.timestamp.getTime()}`;
      if (this.rows.has(key)) {
        updated++;
      } else {
        inserted++;
      }
      this.rows.set(key, { ...record });
    }
    return { inserted, updated, failed: 0 };
  }

  /** Rows ordered by timestamp */
  snapshot(): TransformedReading[] {
    return [...this.rows.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
