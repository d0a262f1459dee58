import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  Environment,
  sourceConnectionConfig,
  targetConnectionConfig,
} from '../config/configuration';
import { SOURCE_CONNECTION, TARGET_CONNECTION } from './database.constants';
import { SourceReading } from './entities/source-reading.entity';
import { TargetReading } from './entities/target-reading.entity';
import { PipelineRunRecord } from './entities/pipeline-run.entity';
import { RunFailureRecord } from './entities/run-failure.entity';
import { Signal } from './entities/signal.entity';
import { SignalValue } from './entities/signal-value.entity';
import { SchemaService } from './schema.service';

export const SOURCE_ENTITIES = [SourceReading];
export const TARGET_ENTITIES = [
  TargetReading,
  PipelineRunRecord,
  RunFailureRecord,
  Signal,
  SignalValue,
];

/**
 * DatabaseModule
 *
 * Opens the two Postgres connections:
 * - 'source': sensor readings as acquired (read side of the pipeline)
 * - 'target': loaded readings, aggregated signals and the run audit
 *
 * synchronize stays off; DDL is issued by SchemaService with
 * IF NOT EXISTS so startup never alters an existing table.
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      name: SOURCE_CONNECTION,
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<Environment, true>) => ({
        type: 'postgres',
        ...sourceConnectionConfig(configService),
        entities: SOURCE_ENTITIES,
        synchronize: false,
        logging: configService.get('DB_LOGGING', { infer: true }),
      }),
      inject: [ConfigService],
    }),
    TypeOrmModule.forRootAsync({
      name: TARGET_CONNECTION,
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<Environment, true>) => ({
        type: 'postgres',
        ...targetConnectionConfig(configService),
        entities: TARGET_ENTITIES,
        synchronize: false,
        logging: configService.get('DB_LOGGING', { infer: true }),
      }),
      inject: [ConfigService],
    }),
    TypeOrmModule.forFeature(SOURCE_ENTITIES, SOURCE_CONNECTION),
    TypeOrmModule.forFeature(TARGET_ENTITIES, TARGET_CONNECTION),
  ],
  providers: [SchemaService],
  exports: [TypeOrmModule, SchemaService],
})
export class DatabaseModule {}
