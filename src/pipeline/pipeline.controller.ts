import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
  DefaultValuePipe,
} from '@nestjs/common';
import type { Response } from 'express';
import { PipelineService } from './pipeline.service';
import { AggregationService, AggregationResult } from '../aggregation/aggregation.service';
import { assertValidWindow } from './extractor.service';
import { PipelineRun } from './interfaces/pipeline.types';
import {
  AggregateRequestSchema,
  formatZodError,
  RunRequestSchema,
} from './dto/run-request.dto';

/**
 * PipelineController
 *
 * Trigger surface for an external scheduler or operator.
 *
 * Endpoints:
 * - POST /pipeline/runs - Run the pipeline over a window
 * - POST /pipeline/runs/daily/:date - Run the pipeline over one day (YYYY-MM-DD)
 * - GET /pipeline/runs - Recent runs of this process
 * - GET /pipeline/runs/:runId - One run (live or from the audit table)
 * - POST /pipeline/runs/:runId/cancel - Cancel at the next batch boundary
 * - POST /pipeline/aggregate - Recompute 10-minute signals for a window
 */
@Controller('pipeline')
export class PipelineController {
  private readonly logger = new Logger(PipelineController.name);

  constructor(
    private readonly pipelineService: PipelineService,
    private readonly aggregationService: AggregationService,
  ) {}

  /**
   * @example
   * curl -X POST http://localhost:3000/pipeline/runs \
   *   -H 'Content-Type: application/json' \
   *   -d '{"windowStart":"2025-08-10T00:00:00","windowEnd":"2025-08-11T00:00:00"}'
   */
  @Post('runs')
  async triggerRun(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ): Promise<PipelineRun> {
    const parsed = RunRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(formatZodError(parsed.error));
    }

    const { windowStart, windowEnd, options, wait } = parsed.data;
    this.logger.log(
      `POST /pipeline/runs [${windowStart.toISOString()}, ${windowEnd.toISOString()}) wait=${wait}`,
    );

    if (!wait) {
      response.status(HttpStatus.ACCEPTED);
      return this.pipelineService.startPipeline(windowStart, windowEnd, options);
    }
    return this.pipelineService.runPipeline(windowStart, windowEnd, options);
  }

  @Post('runs/daily/:date')
  async triggerDailyRun(@Param('date') date: string): Promise<PipelineRun> {
    this.logger.log(`POST /pipeline/runs/daily/${date}`);
    return this.pipelineService.runForDate(date);
  }

  @Get('runs')
  async listRuns(
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ): Promise<{ runs: PipelineRun[] }> {
    return { runs: await this.pipelineService.listRuns(limit) };
  }

  @Get('runs/:runId')
  async getRun(@Param('runId') runId: string): Promise<PipelineRun> {
    return this.pipelineService.getRun(runId);
  }

  @Post('runs/:runId/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  cancelRun(@Param('runId') runId: string): PipelineRun {
    this.logger.log(`POST /pipeline/runs/${runId}/cancel`);
    return this.pipelineService.cancelRun(runId);
  }

  @Post('aggregate')
  async aggregate(@Body() body: unknown): Promise<AggregationResult> {
    const parsed = AggregateRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(formatZodError(parsed.error));
    }
    const { windowStart, windowEnd, sensorId } = parsed.data;
    assertValidWindow(windowStart, windowEnd);
    return this.aggregationService.aggregateWindow(windowStart, windowEnd, sensorId);
  }
}
