import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

/**
 * SignalValue Entity - one aggregated value per (interval start, signal).
 * Long format: a 10-minute interval produces one row per signal that had
 * at least one non-null input value.
 */
@Entity('signal_data')
@Index('uq_signal_data_timestamp_signal', ['timestamp', 'signalId'], { unique: true })
export class SignalValue {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  /** Interval start (naive local time) */
  @Column({ type: 'timestamp' })
  timestamp!: Date;

  @Column({ name: 'signal_id', type: 'integer' })
  signalId!: number;

  @Column({ type: 'double precision' })
  value!: number;
}
