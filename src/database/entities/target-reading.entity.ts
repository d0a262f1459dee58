import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

/**
 * TargetReading Entity - the target store's `data` table.
 *
 * Same five columns as the source plus:
 * - sensorId: natural key part. The source has no device column, so every
 *   run stamps the configured SENSOR_ID.
 * - sourceId: id of the source row the reading was loaded from (lineage).
 *
 * Unique index [sensorId, timestamp] is the conflict target of the
 * loader's upsert; re-loading a window never duplicates rows.
 */
@Entity('data')
@Index('idx_data_timestamp', ['timestamp'])
@Index('uq_data_sensor_timestamp', ['sensorId', 'timestamp'], { unique: true })
export class TargetReading {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'timestamp', nullable: false })
  timestamp!: Date;

  @Column({ name: 'wind_speed', type: 'double precision', nullable: true })
  windSpeed!: number | null;

  @Column({ type: 'double precision', nullable: true })
  power!: number | null;

  @Column({ name: 'ambient_temperature', type: 'double precision', nullable: true })
  ambientTemperature!: number | null;

  @Column({ name: 'sensor_id', type: 'varchar', length: 64, default: 'default' })
  sensorId!: string;

  @Column({ name: 'source_id', type: 'integer', nullable: true })
  sourceId!: number | null;
}
