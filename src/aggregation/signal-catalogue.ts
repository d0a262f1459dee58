/** Reading fields that are aggregated into signals */
export type AggregatedField = 'windSpeed' | 'power';

export type AggregateStatistic = 'mean' | 'min' | 'max' | 'std';

export interface SignalDefinition {
  name: string;
  field: AggregatedField;
  statistic: AggregateStatistic;
  description: string;
}

const FIELD_LABELS: Record<AggregatedField, { column: string; label: string }> = {
  windSpeed: { column: 'wind_speed', label: 'wind speed' },
  power: { column: 'power', label: 'power' },
};

const STATISTIC_LABELS: Record<AggregateStatistic, string> = {
  mean: 'Mean',
  min: 'Minimum',
  max: 'Maximum',
  std: 'Sample standard deviation',
};

export const AGGREGATED_FIELDS: readonly AggregatedField[] = ['windSpeed', 'power'];
export const AGGREGATE_STATISTICS: readonly AggregateStatistic[] = ['mean', 'min', 'max', 'std'];

export function signalName(field: AggregatedField, statistic: AggregateStatistic): string {
  return `${FIELD_LABELS[field].column}_${statistic}`;
}

/** wind_speed_{mean,min,max,std}, power_{mean,min,max,std} */
export const SIGNAL_CATALOGUE: readonly SignalDefinition[] = AGGREGATED_FIELDS.flatMap(
  (field) =>
    AGGREGATE_STATISTICS.map((statistic) => ({
      name: signalName(field, statistic),
      field,
      statistic,
      description: `${STATISTIC_LABELS[statistic]} of ${FIELD_LABELS[field].label} over 10-minute intervals`,
    })),
);
