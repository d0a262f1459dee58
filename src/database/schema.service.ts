import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Environment } from '../config/configuration';
import { SOURCE_CONNECTION, StoreName, TARGET_CONNECTION } from './database.constants';
import { SIGNAL_CATALOGUE } from '../aggregation/signal-catalogue';
import { errorMessage, StoreUnavailableError } from '../common/errors/pipeline.errors';

const READINGS_TABLE_DDL = [
  `CREATE TABLE IF NOT EXISTS data (
    id SERIAL PRIMARY KEY,
    timestamp TIMESTAMP NOT NULL,
    wind_speed DOUBLE PRECISION,
    power DOUBLE PRECISION,
    ambient_temperature DOUBLE PRECISION
  )`,
  `CREATE INDEX IF NOT EXISTS idx_data_timestamp ON data (timestamp)`,
];

const READINGS_TABLE_COMMENTS = [
  `COMMENT ON TABLE data IS 'Sensor readings: timestamp, wind speed, power and ambient temperature'`,
  `COMMENT ON COLUMN data.timestamp IS 'Measurement time (naive local time)'`,
  `COMMENT ON COLUMN data.wind_speed IS 'Wind speed in m/s'`,
  `COMMENT ON COLUMN data.power IS 'Power in kW'`,
  `COMMENT ON COLUMN data.ambient_temperature IS 'Ambient temperature in degrees Celsius'`,
];

const TARGET_ONLY_DDL = [
  `ALTER TABLE data ADD COLUMN IF NOT EXISTS sensor_id VARCHAR(64) NOT NULL DEFAULT 'default'`,
  `ALTER TABLE data ADD COLUMN IF NOT EXISTS source_id INTEGER`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_data_sensor_timestamp ON data (sensor_id, timestamp)`,
  `COMMENT ON COLUMN data.sensor_id IS 'Sensor identity; natural key with timestamp'`,
  `COMMENT ON COLUMN data.source_id IS 'Id of the source row this reading was loaded from'`,
  `CREATE TABLE IF NOT EXISTS pipeline_run (
    run_id UUID PRIMARY KEY,
    window_start TIMESTAMP NOT NULL,
    window_end TIMESTAMP NOT NULL,
    status VARCHAR(20) NOT NULL,
    records_processed INTEGER NOT NULL DEFAULT 0,
    records_failed INTEGER NOT NULL DEFAULT 0,
    batches_succeeded INTEGER NOT NULL DEFAULT 0,
    batches_failed INTEGER NOT NULL DEFAULT 0,
    cancelled BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL,
    started_at TIMESTAMPTZ,
    finished_at TIMESTAMPTZ
  )`,
  `CREATE INDEX IF NOT EXISTS idx_pipeline_run_window ON pipeline_run (window_start, window_end)`,
  `CREATE TABLE IF NOT EXISTS pipeline_run_failure (
    id SERIAL PRIMARY KEY,
    run_id UUID NOT NULL REFERENCES pipeline_run (run_id) ON DELETE CASCADE,
    kind VARCHAR(32) NOT NULL,
    stage VARCHAR(16) NOT NULL,
    batch_sequence INTEGER,
    message TEXT NOT NULL,
    record_id INTEGER,
    record_timestamp TIMESTAMP,
    field VARCHAR(64)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_pipeline_run_failure_run ON pipeline_run_failure (run_id)`,
  `CREATE TABLE IF NOT EXISTS signal (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL UNIQUE,
    description TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS signal_data (
    id SERIAL PRIMARY KEY,
    timestamp TIMESTAMP NOT NULL,
    signal_id INTEGER NOT NULL REFERENCES signal (id),
    value DOUBLE PRECISION NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_signal_data_timestamp_signal ON signal_data (timestamp, signal_id)`,
];

/**
 * SchemaService - idempotent DDL for both stores.
 *
 * Every statement is IF NOT EXISTS / ON CONFLICT DO NOTHING, so
 * ensureSchema() is safe on every startup. Comments are documentation
 * only and are re-applied each time.
 */
@Injectable()
export class SchemaService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SchemaService.name);

  constructor(
    @InjectDataSource(SOURCE_CONNECTION)
    private readonly sourceDataSource: DataSource,
    @InjectDataSource(TARGET_CONNECTION)
    private readonly targetDataSource: DataSource,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.configService.get('SCHEMA_AUTO_ENSURE', { infer: true })) {
      this.logger.log('Schema auto-ensure disabled');
      return;
    }
    await this.ensureAll();
  }

  async ensureAll(): Promise<void> {
    await this.ensureSchema(SOURCE_CONNECTION);
    await this.ensureSchema(TARGET_CONNECTION);
  }

  /**
   * Create the `data` table (and, on the target, the audit and signal
   * tables) when absent. One transaction per store.
   */
  async ensureSchema(store: StoreName): Promise<void> {
    const statements = this.statementsFor(store);
    const dataSource =
      store === SOURCE_CONNECTION ? this.sourceDataSource : this.targetDataSource;

    try {
      await dataSource.transaction(async (manager) => {
        for (const statement of statements) {
          await manager.query(statement);
        }
        if (store === TARGET_CONNECTION) {
          for (const signal of SIGNAL_CATALOGUE) {
            await manager.query(
              'INSERT INTO signal (name, description) VALUES ($1, $2) ON CONFLICT (name) DO NOTHING',
              [signal.name, signal.description],
            );
          }
        }
      });
    } catch (error) {
      throw new StoreUnavailableError(
        `Ensuring ${store} schema failed: ${errorMessage(error)}`,
        error,
      );
    }

    this.logger.log(`Schema ensured for ${store} store (${statements.length} statements)`);
  }

  statementsFor(store: StoreName): string[] {
    const common = [...READINGS_TABLE_DDL, ...READINGS_TABLE_COMMENTS];
    return store === TARGET_CONNECTION ? [...common, ...TARGET_ONLY_DDL] : common;
  }
}
