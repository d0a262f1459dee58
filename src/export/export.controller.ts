import { BadRequestException, Controller, Logger, Param, Post } from '@nestjs/common';
import { isStoreName, STORE_NAMES, StoreName } from '../database/database.constants';
import { ExportService } from './export.service';

/**
 * ExportController
 *
 * Endpoints:
 * - POST /exports/source - Snapshot the source `data` table
 * - POST /exports/target - Snapshot the target `data` table
 */
@Controller('exports')
export class ExportController {
  private readonly logger = new Logger(ExportController.name);

  constructor(private readonly exportService: ExportService) {}

  @Post(':store')
  async export(@Param('store') store: string): Promise<{ store: StoreName; path: string }> {
    if (!isStoreName(store)) {
      throw new BadRequestException(
        `Unknown store '${store}'. Expected one of: ${STORE_NAMES.join(', ')}`,
      );
    }
    this.logger.log(`POST /exports/${store}`);
    const filePath = await this.exportService.exportToSpreadsheet(store);
    return { store, path: filePath };
  }
}
