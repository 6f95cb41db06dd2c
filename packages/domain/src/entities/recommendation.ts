import type { MetricField } from './sensor-reading.js';

/** Returned alone when the window is too small to predict anything. */
export interface AggregateStatus {
  readonly status: string;
}

export type MetricRecommendations = Readonly<Record<MetricField, string>>;

export type Recommendation = AggregateStatus | MetricRecommendations;

export function isAggregateStatus(rec: Recommendation): rec is AggregateStatus {
  return 'status' in rec;
}
