import type {
  IndeterminateMetric,
  MeasuredMetric,
  Metric,
  MetricBase,
  MetricValue,
} from '@shared/types/analysis.types';

/** +Infinity maps to the `infinite` sentinel; everything else is a scalar */
export function toMetricValue(value: number): MetricValue {
  return value === Infinity ? { kind: 'infinite' } : { kind: 'scalar', value };
}

export function measured(base: MetricBase, value: number): MeasuredMetric {
  return { ...base, status: 'measured', value: toMetricValue(value) };
}

export function indeterminate(base: MetricBase, reason: string): IndeterminateMetric {
  return { ...base, status: 'indeterminate', reason };
}

/** Numeric value of a metric: Infinity for the sentinel, null when indeterminate */
export function metricNumber(metric: Metric): number | null {
  if (metric.status === 'indeterminate') return null;
  return metric.value.kind === 'infinite' ? Infinity : metric.value.value;
}

/** Same metric, downgraded to indeterminate; the measured value is dropped */
export function toIndeterminate(metric: Metric, reason: string): IndeterminateMetric {
  if (metric.status === 'indeterminate') return { ...metric, reason };
  const { status, value, ...base } = metric;
  return indeterminate(base, reason);
}
