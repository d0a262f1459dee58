import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { AggregationService } from './aggregation.service';

/**
 * AggregationModule
 *
 * 10-minute signal aggregates (mean/min/max/std of wind speed and power)
 * computed from loaded target readings.
 */
@Module({
  imports: [DatabaseModule],
  providers: [AggregationService],
  exports: [AggregationService],
})
export class AggregationModule {}
