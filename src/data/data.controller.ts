import { BadRequestException, Controller, Get, Logger, Query } from '@nestjs/common';
import { DataInfo, DataRow, DataService, parseVariables } from './data.service';
import { parseLocalDateTime } from '../common/utils/local-time';

interface DataQuery {
  start?: string;
  end?: string;
  variables?: string;
}

function parseDate(name: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = parseLocalDateTime(value);
  if (Number.isNaN(date.getTime())) {
    throw new BadRequestException(`Invalid ${name} date: ${value}`);
  }
  return date;
}

/**
 * DataController
 *
 * Endpoints:
 * - GET /data - Source readings, optionally bounded and projected
 * - GET /data/info - Row count and timestamp range of the source store
 * - GET /data/count - Row count of the source store
 *
 * @example
 * GET /data?start=2024-06-01T00:00:00&end=2024-06-02T00:00:00&variables=timestamp,power
 */
@Controller('data')
export class DataController {
  private readonly logger = new Logger(DataController.name);

  constructor(private readonly dataService: DataService) {}

  @Get('info')
  async getInfo(): Promise<DataInfo> {
    return this.dataService.getInfo();
  }

  @Get('count')
  async getCount(): Promise<{ count: number }> {
    const count = await this.dataService.getCount();
    return { count };
  }

  @Get()
  async getData(@Query() query: DataQuery): Promise<DataRow[]> {
    this.logger.log(`GET /data with query: ${JSON.stringify(query)}`);

    const start = parseDate('start', query.start);
    const end = parseDate('end', query.end);
    if (start && end && start > end) {
      throw new BadRequestException('start must not be after end');
    }

    const variables = parseVariables(query.variables);
    return this.dataService.getReadings(variables, start, end);
  }
}
