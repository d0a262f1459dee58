import { Entity, Column, PrimaryColumn, Index, OneToMany } from 'typeorm';
import { RunFailureRecord } from './run-failure.entity';

/**
 * PipelineRunRecord Entity - audit row for a terminal pipeline run.
 *
 * Written once when the run reaches Succeeded, Failed or PartiallyFailed
 * and never updated afterwards.
 */
@Entity('pipeline_run')
@Index('idx_pipeline_run_window', ['windowStart', 'windowEnd'])
export class PipelineRunRecord {
  @PrimaryColumn({ name: 'run_id', type: 'uuid' })
  runId!: string;

  @Column({ name: 'window_start', type: 'timestamp' })
  windowStart!: Date;

  @Column({ name: 'window_end', type: 'timestamp' })
  windowEnd!: Date;

  /** Succeeded | Failed | PartiallyFailed */
  @Column({ type: 'varchar', length: 20 })
  status!: string;

  @Column({ name: 'records_processed', type: 'integer', default: 0 })
  recordsProcessed!: number;

  @Column({ name: 'records_failed', type: 'integer', default: 0 })
  recordsFailed!: number;

  @Column({ name: 'batches_succeeded', type: 'integer', default: 0 })
  batchesSucceeded!: number;

  @Column({ name: 'batches_failed', type: 'integer', default: 0 })
  batchesFailed!: number;

  @Column({ type: 'boolean', default: false })
  cancelled!: boolean;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'started_at', type: 'timestamptz', nullable: true })
  startedAt!: Date | null;

  @Column({ name: 'finished_at', type: 'timestamptz', nullable: true })
  finishedAt!: Date | null;

  @OneToMany(() => RunFailureRecord, (failure) => failure.run)
  failures!: RunFailureRecord[];
}
