import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { PipelineRunRecord } from './pipeline-run.entity';

/**
 * RunFailureRecord Entity - one failure cause recorded against a run.
 *
 * Record-level faults (CorruptRecord, ValidationError) carry the source
 * row identity; batch-level faults (SourceUnavailable, TargetUnavailable,
 * ConstraintViolation) carry only the batch sequence.
 */
@Entity('pipeline_run_failure')
@Index('idx_pipeline_run_failure_run', ['runId'])
export class RunFailureRecord {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'run_id', type: 'uuid' })
  runId!: string;

  @ManyToOne(() => PipelineRunRecord, (run) => run.failures, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'run_id' })
  run!: PipelineRunRecord;

  @Column({ type: 'varchar', length: 32 })
  kind!: string;

  /** extract | transform | load | aggregate */
  @Column({ type: 'varchar', length: 16 })
  stage!: string;

  @Column({ name: 'batch_sequence', type: 'integer', nullable: true })
  batchSequence!: number | null;

  @Column({ type: 'text' })
  message!: string;

  @Column({ name: 'record_id', type: 'integer', nullable: true })
  recordId!: number | null;

  @Column({ name: 'record_timestamp', type: 'timestamp', nullable: true })
  recordTimestamp!: Date | null;

  @Column({ type: 'varchar', length: 64, nullable: true })
  field!: string | null;
}
