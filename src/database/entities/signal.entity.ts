import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

/**
 * Signal Entity - catalogue of aggregated signals (e.g. `wind_speed_mean`).
 * Seeded by SchemaService; the aggregation resolves names to ids.
 */
@Entity('signal')
export class Signal {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'varchar', length: 100, unique: true })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;
}
