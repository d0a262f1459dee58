import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { validateEnvironment } from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { AggregationModule } from './aggregation/aggregation.module';
import { ExportModule } from './export/export.module';
import { DataModule } from './data/data.module';
import { HealthModule } from './health/health.module';
import { PipelineErrorFilter } from './common/filters/pipeline-error.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    DatabaseModule,
    PipelineModule,
    AggregationModule,
    ExportModule,
    DataModule,
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: PipelineErrorFilter }],
})
export class AppModule {}
