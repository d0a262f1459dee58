import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

/**
 * SourceReading Entity - one row of the source store's `data` table.
 *
 * The table is owned by the sensor acquisition side; this service only reads
 * it (and creates it idempotently in development, see SchemaService).
 *
 * Timestamps are `timestamp without time zone`: readings are naive local
 * time and are never shifted to UTC.
 */
@Entity('data')
@Index('idx_data_timestamp', ['timestamp'])
export class SourceReading {
  /** Surrogate key assigned by the source store, monotonic */
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'timestamp', nullable: false })
  timestamp!: Date;

  /** Wind speed in m/s; null on sensor dropout */
  @Column({ name: 'wind_speed', type: 'double precision', nullable: true })
  windSpeed!: number | null;

  /** Active power in kW; null on sensor dropout */
  @Column({ type: 'double precision', nullable: true })
  power!: number | null;

  /** Ambient temperature in °C; null on sensor dropout */
  @Column({ name: 'ambient_temperature', type: 'double precision', nullable: true })
  ambientTemperature!: number | null;
}
