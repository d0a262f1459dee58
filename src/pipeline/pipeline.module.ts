import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { AggregationModule } from '../aggregation/aggregation.module';
import { PipelineController } from './pipeline.controller';
import { PipelineService } from './pipeline.service';
import { ExtractorService } from './extractor.service';
import { TransformerService } from './transformer.service';
import { LoaderService } from './loader.service';
import { RunRegistry } from './run-registry.service';
import { RunAuditService } from './run-audit.service';

/**
 * PipelineModule
 *
 * Extract -> Transform -> Load over a time window, coordinated by
 * PipelineService.
 *
 * Components:
 * - ExtractorService: keyset-paginated batches from the source store
 * - TransformerService: per-reading validation and mapping
 * - LoaderService: transactional upsert into the target store
 * - RunRegistry: live runs and the per-window guard
 * - RunAuditService: terminal runs persisted in the target store
 * - PipelineController: HTTP trigger surface
 */
@Module({
  imports: [DatabaseModule, AggregationModule],
  controllers: [PipelineController],
  providers: [
    PipelineService,
    ExtractorService,
    TransformerService,
    LoaderService,
    RunRegistry,
    RunAuditService,
  ],
  exports: [PipelineService],
})
export class PipelineModule {}
