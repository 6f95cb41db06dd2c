export const METRIC_FIELDS = ['ph', 'turbidity', 'temperature'] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

/** A persisted row of the reading history. Rows are never updated. */
export interface SensorReading {
  readonly ph: number | null;
  readonly turbidity: number | null;
  readonly temperature: number | null;
  /** Assigned by the store at insert time. */
  readonly timestamp: Date;
}

export type NewSensorReading = Omit<SensorReading, 'timestamp'>;
