import { Logger } from '@nestjs/common';
import { Command, CommanderError } from 'commander';
import { AggregationService } from '../aggregation/aggregation.service';
import { errorMessage, ValidationError } from '../common/errors/pipeline.errors';
import { isStoreName, STORE_NAMES } from '../database/database.constants';
import { SchemaService } from '../database/schema.service';
import { ExportService } from '../export/export.service';
import { parseLocalDateTime } from '../common/utils/local-time';
import { assertValidWindow } from '../pipeline/extractor.service';
import { RunStatus } from '../pipeline/interfaces/pipeline.types';
import { PipelineService } from '../pipeline/pipeline.service';

export interface CliServices {
  schema: Pick<SchemaService, 'ensureAll'>;
  pipeline: Pick<PipelineService, 'runPipeline' | 'runForDate'>;
  aggregation: Pick<AggregationService, 'aggregateWindow'>;
  exporter: Pick<ExportService, 'exportToSpreadsheet'>;
}

export interface CliContext {
  services: CliServices;
  close(): Promise<void>;
}

export type OpenCliContext = () => Promise<CliContext>;

interface WindowOptions {
  start?: string;
  end?: string;
  date?: string;
}

const logger = new Logger('Cli');

function parseWindow(options: WindowOptions): { windowStart: Date; windowEnd: Date } {
  if (!options.start || !options.end) {
    throw new ValidationError('window', '--start and --end are both required');
  }
  const windowStart = parseLocalDateTime(options.start);
  const windowEnd = parseLocalDateTime(options.end);
  assertValidWindow(windowStart, windowEnd);
  return { windowStart, windowEnd };
}

function windowArgs(window: { windowStart: Date; windowEnd: Date }): [Date, Date] {
  return [window.windowStart, window.windowEnd];
}

/**
 * Runs one CLI invocation and resolves with its exit code:
 * 0 when the action succeeded (a run only when it ended Succeeded), 1 otherwise.
 *
 * @example
 * sensor-etl run --date 2024-06-01
 * sensor-etl run --start 2024-06-01T00:00:00 --end 2024-06-01T06:00:00
 * sensor-etl export target
 */
export async function runCli(
  argv: string[],
  open: OpenCliContext,
  output: (line: string) => void = console.log,
): Promise<number> {
  let exitCode = 0;

  const withServices = async (action: (services: CliServices) => Promise<boolean>) => {
    let context: CliContext | undefined;
    try {
      context = await open();
      exitCode = (await action(context.services)) ? 0 : 1;
    } catch (error) {
      logger.error(errorMessage(error));
      exitCode = 1;
    } finally {
      await context?.close();
    }
  };

  const program = new Command()
    .name('sensor-etl')
    .description('Sensor readings ETL between the source and target stores')
    .exitOverride();

  program
    .command('schema')
    .description('Create missing tables, indexes and signals in both stores')
    .action(() =>
      withServices(async ({ schema }) => {
        await schema.ensureAll();
        output('Schema ensured on source and target stores');
        return true;
      }),
    );

  program
    .command('run')
    .description('Run the pipeline over [start, end) or over one calendar day')
    .option('--start <iso>', 'Window start (inclusive)')
    .option('--end <iso>', 'Window end (exclusive)')
    .option('--date <yyyy-mm-dd>', 'Whole day window; overrides --start/--end')
    .action((options: WindowOptions) =>
      withServices(async ({ pipeline }) => {
        const run = options.date
          ? await pipeline.runForDate(options.date)
          : await pipeline.runPipeline(...windowArgs(parseWindow(options)));
        output(JSON.stringify(run, null, 2));
        return run.status === RunStatus.Succeeded;
      }),
    );

  program
    .command('aggregate')
    .description('Recompute 10-minute aggregates for [start, end) in the target store')
    .requiredOption('--start <iso>', 'Window start (inclusive)')
    .requiredOption('--end <iso>', 'Window end (exclusive)')
    .action((options: WindowOptions) =>
      withServices(async ({ aggregation }) => {
        const { windowStart, windowEnd } = parseWindow(options);
        const result = await aggregation.aggregateWindow(windowStart, windowEnd);
        output(`Aggregated ${result.intervals} interval(s), ${result.values} value(s)`);
        return true;
      }),
    );

  program
    .command('export')
    .description('Write a spreadsheet snapshot of a store')
    .argument('<store>', `One of: ${STORE_NAMES.join(', ')}`)
    .action((store: string) =>
      withServices(async ({ exporter }) => {
        if (!isStoreName(store)) {
          throw new ValidationError('store', `expected one of ${STORE_NAMES.join(', ')}, got '${store}'`);
        }
        output(await exporter.exportToSpreadsheet(store));
        return true;
      }),
    );

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
