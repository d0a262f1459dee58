#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AggregationService } from './aggregation/aggregation.service';
import { AppModule } from './app.module';
import { runCli } from './cli/cli.program';
import { SchemaService } from './database/schema.service';
import { ExportService } from './export/export.service';
import { PipelineService } from './pipeline/pipeline.service';

runCli(process.argv.slice(2), async () => {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  return {
    services: {
      schema: app.get(SchemaService),
      pipeline: app.get(PipelineService),
      aggregation: app.get(AggregationService),
      exporter: app.get(ExportService),
    },
    close: () => app.close(),
  };
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    Logger.error(error instanceof Error ? error.stack : String(error), 'Cli');
    process.exitCode = 1;
  });
