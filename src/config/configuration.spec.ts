import {
  EnvironmentSchema,
  sourceConnectionConfig,
  targetConnectionConfig,
  validateEnvironment,
} from './configuration';
import { createConfigServiceMock } from '../../test/utils/test-config';

describe('validateEnvironment', () => {
  it('should fill in defaults for an empty environment', () => {
    const env = validateEnvironment({});

    expect(env).toMatchObject({
      PORT: 3000,
      SOURCE_DB_PORT: 5432,
      TARGET_DB_PORT: 5433,
      SENSOR_ID: 'default',
      BATCH_SIZE: 1000,
      MAX_ATTEMPTS: 3,
      CONTINUE_ON_BATCH_FAILURE: false,
      AGGREGATION_ENABLED: true,
      SCHEMA_AUTO_ENSURE: true,
      EXPORT_DIR: 'exports',
    });
  });

  it('should coerce numeric and boolean strings', () => {
    const env = validateEnvironment({
      BATCH_SIZE: '250',
      CONTINUE_ON_BATCH_FAILURE: '1',
      DB_LOGGING: 'true',
      POWER_MIN: '-50.5',
    });

    expect(env.BATCH_SIZE).toBe(250);
    expect(env.CONTINUE_ON_BATCH_FAILURE).toBe(true);
    expect(env.DB_LOGGING).toBe(true);
    expect(env.POWER_MIN).toBe(-50.5);
  });

  it('should list every invalid variable', () => {
    const invalid = () => validateEnvironment({ BATCH_SIZE: '0', TARGET_DB_PORT: 'abc' });

    expect(invalid).toThrow(/^Invalid environment configuration: /);
    expect(invalid).toThrow(/TARGET_DB_PORT: /);
    expect(invalid).toThrow(/BATCH_SIZE: /);
  });

  it('should cap the load chunk below the bind parameter limit', () => {
    expect(EnvironmentSchema.safeParse({ LOAD_CHUNK_SIZE: '10000' }).success).toBe(true);
    expect(() => validateEnvironment({ LOAD_CHUNK_SIZE: '10923' })).toThrow(/LOAD_CHUNK_SIZE: /);
  });

  it('should reject a boolean it cannot read', () => {
    expect(EnvironmentSchema.safeParse({ AGGREGATION_ENABLED: 'yes' }).success).toBe(false);
  });
});

describe('connection configs', () => {
  it('should read each store from its own variables', () => {
    const config = createConfigServiceMock({
      SOURCE_DB_HOST: 'source.local',
      TARGET_DB_HOST: 'target.local',
      TARGET_DB_PASSWORD: 'test-secret',
    });

    expect(sourceConnectionConfig(config)).toEqual({
      host: 'source.local',
      port: 5432,
      username: 'source_user',
      password: '',
      database: 'source_db',
    });
    expect(targetConnectionConfig(config)).toMatchObject({
      host: 'target.local',
      port: 5433,
      password: 'test-secret',
    });
  });
});
