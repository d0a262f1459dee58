import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

/**
 * Environment schema, validated once by ConfigModule at startup.
 * Values arrive as strings; coercion turns them into the types below.
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const dbPort = z.coerce.number().int().min(1).max(65535);

export const EnvironmentSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  SOURCE_DB_HOST: z.string().default('localhost'),
  SOURCE_DB_PORT: dbPort.default(5432),
  SOURCE_DB_USERNAME: z.string().default('source_user'),
  SOURCE_DB_PASSWORD: z.string().default(''),
  SOURCE_DB_DATABASE: z.string().default('source_db'),

  TARGET_DB_HOST: z.string().default('localhost'),
  TARGET_DB_PORT: dbPort.default(5433),
  TARGET_DB_USERNAME: z.string().default('target_user'),
  TARGET_DB_PASSWORD: z.string().default(''),
  TARGET_DB_DATABASE: z.string().default('target_db'),

  DB_LOGGING: booleanFlag.default('false'),
  SCHEMA_AUTO_ENSURE: booleanFlag.default('true'),

  SENSOR_ID: z.string().min(1).max(64).default('default'),
  BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  // Six bind parameters per row; Postgres allows 65535 per statement
  LOAD_CHUNK_SIZE: z.coerce.number().int().positive().max(10000).default(500),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(500),
  BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(10000),
  CONTINUE_ON_BATCH_FAILURE: booleanFlag.default('false'),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AGGREGATION_ENABLED: booleanFlag.default('true'),

  WIND_SPEED_MAX: z.coerce.number().positive().default(75),
  POWER_MIN: z.coerce.number().default(-100),
  POWER_MAX: z.coerce.number().default(10000),

  EXPORT_DIR: z.string().min(1).default('exports'),
  RUN_HISTORY_LIMIT: z.coerce.number().int().positive().default(100),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * `validate` hook for ConfigModule.forRoot().
 * Throws with every offending variable listed so a misconfigured
 * deployment fails before any connection is opened.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Environment {
  const parsed = EnvironmentSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

/** Connection settings of one Postgres store */
export interface StoreConnectionConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

type EnvironmentReader = Pick<ConfigService<Environment, true>, 'get'>;

export function sourceConnectionConfig(
  config: EnvironmentReader,
): StoreConnectionConfig {
  return {
    host: config.get('SOURCE_DB_HOST', { infer: true }),
    port: config.get('SOURCE_DB_PORT', { infer: true }),
    username: config.get('SOURCE_DB_USERNAME', { infer: true }),
    password: config.get('SOURCE_DB_PASSWORD', { infer: true }),
    database: config.get('SOURCE_DB_DATABASE', { infer: true }),
  };
}

export function targetConnectionConfig(
  config: EnvironmentReader,
): StoreConnectionConfig {
  return {
    host: config.get('TARGET_DB_HOST', { infer: true }),
    port: config.get('TARGET_DB_PORT', { infer: true }),
    username: config.get('TARGET_DB_USERNAME', { infer: true }),
    password: config.get('TARGET_DB_PASSWORD', { infer: true }),
    database: config.get('TARGET_DB_DATABASE', { infer: true }),
  };
}
