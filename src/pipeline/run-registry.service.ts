import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../config/configuration';
import { RunAlreadyActiveError } from '../common/errors/pipeline.errors';
import { PipelineRun, RunStatus, TERMINAL_STATUSES } from './interfaces/pipeline.types';

const ALLOWED_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.Pending]: [RunStatus.Running, RunStatus.Failed],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.PartiallyFailed],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.PartiallyFailed]: [],
};

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Half-open windows overlap when each starts before the other ends; equal windows always clash */
export function windowsOverlap(
  a: { windowStart: Date; windowEnd: Date },
  b: { windowStart: Date; windowEnd: Date },
): boolean {
  const aStart = a.windowStart.getTime();
  const aEnd = a.windowEnd.getTime();
  const bStart = b.windowStart.getTime();
  const bEnd = b.windowEnd.getTime();
  if (aStart === bStart && aEnd === bEnd) return true;
  return aStart < bEnd && bStart < aEnd;
}

export function snapshotRun(run: PipelineRun): PipelineRun {
  return {
    ...run,
    windowStart: new Date(run.windowStart),
    windowEnd: new Date(run.windowEnd),
    createdAt: new Date(run.createdAt),
    startedAt: run.startedAt ? new Date(run.startedAt) : null,
    finishedAt: run.finishedAt ? new Date(run.finishedAt) : null,
    failures: run.failures.map((failure) => ({ ...failure })),
  };
}

/**
 * RunRegistry - in-process map of run id to PipelineRun.
 *
 * Owned by the orchestrator: it is the only caller of register() and
 * transition(). Also the per-window guard: registering a run whose window
 * overlaps a Pending or Running run throws RunAlreadyActive. Check and
 * insert happen in one synchronous call, so two triggers on the same
 * window cannot both pass.
 *
 * Terminal runs are kept up to RUN_HISTORY_LIMIT, oldest evicted first;
 * the audit table is the durable record.
 */
@Injectable()
export class RunRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(RunRegistry.name);
  private readonly runs = new Map<string, PipelineRun>();
  private readonly cancellations = new Set<string>();
  private readonly historyLimit: number;

  constructor(configService: ConfigService<Environment, true>) {
    this.historyLimit = configService.get('RUN_HISTORY_LIMIT', { infer: true });
  }

  register(run: PipelineRun): void {
    for (const active of this.runs.values()) {
      if (!isTerminal(active.status) && windowsOverlap(active, run)) {
        throw new RunAlreadyActiveError(active.runId);
      }
    }
    this.runs.set(run.runId, run);
  }

  get(runId: string): PipelineRun | undefined {
    const run = this.runs.get(runId);
    return run ? snapshotRun(run) : undefined;
  }

  /** Most recent first */
  list(limit = this.historyLimit): PipelineRun[] {
    return [...this.runs.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(snapshotRun);
  }

  activeRuns(): PipelineRun[] {
    return [...this.runs.values()].filter((run) => !isTerminal(run.status)).map(snapshotRun);
  }

  transition(runId: string, next: RunStatus): PipelineRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Cannot transition unknown run ${runId}`);
    }
    if (!ALLOWED_TRANSITIONS[run.status].includes(next)) {
      throw new Error(`Illegal run transition ${run.status} -> ${next} for ${runId}`);
    }

    run.status = next;
    const now = new Date();
    if (next === RunStatus.Running) {
      run.startedAt = now;
    }
    if (isTerminal(next)) {
      run.finishedAt = now;
      this.cancellations.delete(runId);
      this.evictHistory();
    }
    return run;
  }

  requestCancel(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run || isTerminal(run.status)) return false;
    this.cancellations.add(runId);
    return true;
  }

  isCancelRequested(runId: string): boolean {
    return this.cancellations.has(runId);
  }

  onModuleDestroy(): void {
    const active = this.activeRuns();
    if (active.length > 0) {
      this.logger.warn(
        `Shutting down with ${active.length} active run(s): ${active.map((run) => run.runId).join(', ')}`,
      );
    }
    this.runs.clear();
    this.cancellations.clear();
  }

  private evictHistory(): void {
    const terminal = [...this.runs.values()]
      .filter((run) => isTerminal(run.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    const excess = terminal.length - this.historyLimit;
    for (const run of terminal.slice(0, Math.max(0, excess))) {
      this.runs.delete(run.runId);
    }
  }
}
