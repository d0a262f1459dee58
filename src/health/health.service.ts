import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Environment } from '../config/configuration';
import {
  SOURCE_CONNECTION,
  StoreName,
  TARGET_CONNECTION,
} from '../database/database.constants';
import { errorMessage, StoreUnavailableError } from '../common/errors/pipeline.errors';
import { withTimeout } from '../common/utils/with-timeout';

export type StoreStatus = 'up' | 'down';

export interface HealthReport {
  status: 'ok' | 'error';
  stores: Record<StoreName, StoreStatus>;
  timestamp: string;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @InjectDataSource(SOURCE_CONNECTION)
    private readonly sourceDataSource: DataSource,
    @InjectDataSource(TARGET_CONNECTION)
    private readonly targetDataSource: DataSource,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  /** Probes both stores in parallel; never throws */
  async check(): Promise<HealthReport> {
    const [source, target] = await Promise.all([
      this.probe(SOURCE_CONNECTION, this.sourceDataSource),
      this.probe(TARGET_CONNECTION, this.targetDataSource),
    ]);

    return {
      status: source === 'up' && target === 'up' ? 'ok' : 'error',
      stores: { source, target },
      timestamp: new Date().toISOString(),
    };
  }

  private async probe(store: StoreName, dataSource: DataSource): Promise<StoreStatus> {
    const timeoutMs = this.configService.get('STORE_TIMEOUT_MS', { infer: true });
    try {
      await withTimeout(
        dataSource.query('SELECT 1'),
        timeoutMs,
        () => new StoreUnavailableError(`${store} store probe timed out after ${timeoutMs}ms`),
      );
      return 'up';
    } catch (error) {
      this.logger.warn(`Health probe failed for ${store} store: ${errorMessage(error)}`);
      return 'down';
    }
  }
}
