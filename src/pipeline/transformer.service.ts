import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../config/configuration';
import { ValidationError } from '../common/errors/pipeline.errors';
import { Batch, SensorReading, TransformedReading } from './interfaces/pipeline.types';

/** Inclusive bounds; a null reading value is never checked */
export interface ValueRange {
  min: number;
  max: number;
  unit: string;
}

export interface ValidationRules {
  windSpeed: ValueRange;
  power: ValueRange;
  ambientTemperature: ValueRange;
}

type RangedField = keyof ValidationRules;

/** Column order; the first failing field is the one reported */
const RANGED_FIELDS: readonly { field: RangedField; column: string }[] = [
  { field: 'windSpeed', column: 'wind_speed' },
  { field: 'power', column: 'power' },
  { field: 'ambientTemperature', column: 'ambient_temperature' },
];

export interface RejectedReading {
  reading: SensorReading;
  error: ValidationError;
}

export interface TransformedBatch {
  sequence: number;
  valid: TransformedReading[];
  rejected: RejectedReading[];
}

/**
 * TransformerService - per-reading validation and mapping.
 *
 * Pure: the result depends only on the reading, the sensor id and the
 * rules fixed at construction. Every reading ends either in `valid` or in
 * `rejected`; nulls pass through untouched.
 */
@Injectable()
export class TransformerService {
  readonly rules: ValidationRules;

  constructor(configService: ConfigService<Environment, true>) {
    this.rules = {
      windSpeed: {
        min: 0,
        max: configService.get('WIND_SPEED_MAX', { infer: true }),
        unit: 'm/s',
      },
      power: {
        min: configService.get('POWER_MIN', { infer: true }),
        max: configService.get('POWER_MAX', { infer: true }),
        unit: 'kW',
      },
      ambientTemperature: { min: -60, max: 70, unit: '°C' },
    };
  }

  transform(reading: SensorReading, sensorId: string): TransformedReading {
    for (const { field, column } of RANGED_FIELDS) {
      const value = reading[field];
      if (value === null) continue;

      const range = this.rules[field];
      if (value < range.min || value > range.max) {
        throw new ValidationError(
          column,
          `${value} ${range.unit} outside [${range.min}, ${range.max}]`,
          reading.id,
          reading.timestamp,
        );
      }
    }

    return {
      sensorId,
      sourceId: reading.id,
      timestamp: reading.timestamp,
      // -0 from upstream float arithmetic is stored as 0
      windSpeed: normalizeZero(reading.windSpeed),
      power: normalizeZero(reading.power),
      ambientTemperature: normalizeZero(reading.ambientTemperature),
    };
  }

  transformBatch(batch: Batch, sensorId: string): TransformedBatch {
    const valid: TransformedReading[] = [];
    const rejected: RejectedReading[] = [];

    for (const reading of batch.readings) {
      try {
        valid.push(this.transform(reading, sensorId));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        rejected.push({ reading, error });
      }
    }

    return { sequence: batch.sequence, valid, rejected };
  }
}

function normalizeZero(value: number | null): number | null {
  return value === 0 ? 0 : value;
}
