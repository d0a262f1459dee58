/**
 * Source Data Seeder
 *
 * Fills the source store's `data` table with synthetic one-minute wind
 * turbine readings for local development:
 * - wind speed: slow random walk around a diurnal mean, 0-25 m/s
 * - power: generic 2 MW power curve (cut-in 3 m/s, rated 12 m/s, cut-out 25 m/s)
 * - ambient temperature: daily sine between ~8 and ~18 °C
 *
 * About 1% of readings have a sensor dropout (null field) and about 0.1%
 * carry an out-of-range value, so validation failures show up in runs.
 * The output is deterministic for a given start date and seed.
 *
 * Existing rows inside the seeded range are replaced. Run `sensor-etl schema`
 * first so the table exists.
 *
 * Run: npm run seed -- [days] [yyyy-mm-dd start]
 */

import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  Environment,
  sourceConnectionConfig,
  validateEnvironment,
} from '../../config/configuration';
import { SourceReading } from '../entities/source-reading.entity';

const INTERVAL_MINUTES = 1;
const INSERT_BATCH_SIZE = 1000;
const DEFAULT_DAYS = 7;

const RATED_POWER_KW = 2000;
const CUT_IN_MS = 3;
const RATED_SPEED_MS = 12;
const CUT_OUT_MS = 25;

export type SeedReading = Pick<
  SourceReading,
  'timestamp' | 'windSpeed' | 'power' | 'ambientTemperature'
>;

/** mulberry32: small deterministic PRNG, returns values in [0, 1) */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Electrical output in kW for a hub-height wind speed in m/s */
export function powerCurve(windSpeed: number): number {
  if (windSpeed < CUT_IN_MS || windSpeed >= CUT_OUT_MS) return 0;
  if (windSpeed >= RATED_SPEED_MS) return RATED_POWER_KW;
  const fraction = (windSpeed ** 3 - CUT_IN_MS ** 3) / (RATED_SPEED_MS ** 3 - CUT_IN_MS ** 3);
  return RATED_POWER_KW * fraction;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Generate readings at one-minute spacing from `start` (local time) for `days` days.
 */
export function generateReadings(start: Date, days: number, seed = 42): SeedReading[] {
  const random = createRandom(seed);
  const readings: SeedReading[] = [];
  const total = (days * 24 * 60) / INTERVAL_MINUTES;
  let windSpeed = 8;

  for (let i = 0; i < total; i++) {
    const timestamp = new Date(
      start.getFullYear(),
      start.getMonth(),
      start.getDate(),
      start.getHours(),
      start.getMinutes() + i * INTERVAL_MINUTES,
    );
    const hour = timestamp.getHours() + timestamp.getMinutes() / 60;

    // Windier in the afternoon; random walk pulled back toward the diurnal mean
    const diurnalMean = 8 + 3 * Math.sin(((hour - 9) / 24) * 2 * Math.PI);
    windSpeed += 0.1 * (diurnalMean - windSpeed) + (random() - 0.5) * 1.2;
    windSpeed = Math.min(CUT_OUT_MS, Math.max(0, windSpeed));

    const reading: SeedReading = {
      timestamp,
      windSpeed: round(windSpeed, 2),
      power: round(Math.max(0, powerCurve(windSpeed) * (0.97 + random() * 0.06)), 1),
      ambientTemperature: round(13 + 5 * Math.sin(((hour - 9) / 24) * 2 * Math.PI), 1),
    };

    const fault = random();
    if (fault < 0.01) {
      reading.power = null;
    } else if (fault < 0.011) {
      reading.windSpeed = -1;
    }
    readings.push(reading);
  }

  return readings;
}

function parseArgs(argv: string[]): { days: number; start: Date } {
  const days = argv[0] ? Number(argv[0]) : DEFAULT_DAYS;
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error(`Invalid day count: ${argv[0]}`);
  }

  let start: Date;
  if (argv[1]) {
    const [year, month, day] = argv[1].split('-').map(Number);
    start = new Date(year, month - 1, day);
    if (Number.isNaN(start.getTime())) {
      throw new Error(`Invalid start date: ${argv[1]}`);
    }
  } else {
    // Default: the `days` full days before today
    const today = new Date();
    start = new Date(today.getFullYear(), today.getMonth(), today.getDate() - days);
  }
  return { days, start };
}

async function seedSourceData(): Promise<void> {
  const { days, start } = parseArgs(process.argv.slice(2));
  const config = new ConfigService<Environment, true>(validateEnvironment(process.env));
  const dataSource = new DataSource({
    type: 'postgres',
    ...sourceConnectionConfig(config),
    entities: [SourceReading],
    synchronize: false,
  });

  console.log('Connecting to source store...');
  await dataSource.initialize();

  try {
    const readings = generateReadings(start, days);
    const end = new Date(start.getFullYear(), start.getMonth(), start.getDate() + days);
    console.log(
      `Generated ${readings.length} readings for ${start.toISOString()} - ${end.toISOString()}`,
    );

    await dataSource.transaction(async (manager) => {
      await manager.query('DELETE FROM data WHERE timestamp >= $1 AND timestamp < $2', [
        start,
        end,
      ]);
      for (let i = 0; i < readings.length; i += INSERT_BATCH_SIZE) {
        const batch: QueryDeepPartialEntity<SourceReading>[] = readings.slice(
          i,
          i + INSERT_BATCH_SIZE,
        );
        await manager.insert(SourceReading, batch);
      }
    });

    const faults = readings.filter(
      (r) => r.power === null || (r.windSpeed !== null && r.windSpeed < 0),
    ).length;
    console.log(`Inserted ${readings.length} readings (${faults} with injected faults)`);
  } finally {
    await dataSource.destroy();
  }
}

if (require.main === module) {
  seedSourceData().catch((error: unknown) => {
    console.error('Seeding failed:', error);
    process.exit(1);
  });
}
