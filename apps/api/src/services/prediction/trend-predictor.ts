import type {
  MetricField,
  Recommendation,
  ReadingRepositoryPort,
  SensorReading,
} from '@poolwatch/domain';
import { fitLeastSquares, project } from './least-squares.js';

export const PREDICTION_WINDOW = 100;
export const MIN_POINTS = 5;
export const PROJECTION_HORIZON_S = 3600;

export const PH_OPTIMAL_MIN = 7.2;
export const PH_OPTIMAL_MAX = 7.8;
export const TURBIDITY_MAX = 5.0;

export const MESSAGES = {
  notEnoughData: 'Not enough data for accurate prediction.',
  ph: {
    insufficient: 'Insufficient data for pH prediction.',
    dropping: 'pH is predicted to drop below optimal levels soon. Consider adding pH Increaser.',
    rising: 'pH is predicted to rise above optimal levels soon. Consider adding pH Reducer.',
    stable: 'pH is stable.',
  },
  turbidity: {
    insufficient: 'Insufficient data for turbidity prediction.',
    rising: 'Turbidity is predicted to increase. Consider backwashing filter or adding clarifier.',
    stable: 'Turbidity is stable.',
  },
  temperature: 'Temperature monitoring is active.',
} as const;

type ProjectedMetric = Exclude<MetricField, 'temperature'>;

export interface MetricProjection {
  /** Fitted value one hour after the newest reading in the window. */
  projected: number;
  /** Newest non-null value of the metric. */
  latest: number;
}

function toEpochSeconds(ts: Date): number {
  return ts.getTime() / 1000;
}

/**
 * Fit `metric` over the non-null points of a newest-first window and project it
 * one hour past the newest reading overall, even when that reading has no value
 * for `metric`. Returns null with fewer than MIN_POINTS usable points.
 */
export function projectMetric(
  window: readonly SensorReading[],
  metric: ProjectedMetric,
): MetricProjection | null {
  const newest = window[0];
  if (!newest) return null;

  const xs: number[] = [];
  const ys: number[] = [];
  for (const reading of window) {
    const value = reading[metric];
    if (value === null) continue;
    xs.push(toEpochSeconds(reading.timestamp));
    ys.push(value);
  }

  const latest = ys[0];
  if (latest === undefined || ys.length < MIN_POINTS) return null;

  const fit = fitLeastSquares(xs, ys);
  const anchor = toEpochSeconds(newest.timestamp) + PROJECTION_HORIZON_S;
  return { projected: project(fit, anchor), latest };
}

function classifyPh(p: MetricProjection | null): string {
  if (!p) return MESSAGES.ph.insufficient;
  if (p.projected < PH_OPTIMAL_MIN && p.latest >= PH_OPTIMAL_MIN) return MESSAGES.ph.dropping;
  if (p.projected > PH_OPTIMAL_MAX && p.latest <= PH_OPTIMAL_MAX) return MESSAGES.ph.rising;
  return MESSAGES.ph.stable;
}

function classifyTurbidity(p: MetricProjection | null): string {
  if (!p) return MESSAGES.turbidity.insufficient;
  if (p.projected > TURBIDITY_MAX && p.latest <= TURBIDITY_MAX) return MESSAGES.turbidity.rising;
  return MESSAGES.turbidity.stable;
}

/** Pure: the same window always yields the same recommendation. */
export function predictRecommendations(window: readonly SensorReading[]): Recommendation {
  if (window.length < MIN_POINTS) {
    return { status: MESSAGES.notEnoughData };
  }
  return {
    ph: classifyPh(projectMetric(window, 'ph')),
    turbidity: classifyTurbidity(projectMetric(window, 'turbidity')),
    temperature: MESSAGES.temperature,
  };
}

export class TrendPredictor {
  constructor(
    private readonly readings: ReadingRepositoryPort,
    private readonly windowSize: number = PREDICTION_WINDOW,
  ) {}

  /** Storage failures propagate unchanged. */
  async recommend(): Promise<Recommendation> {
    const window = await this.readings.queryRecent(this.windowSize);
    return predictRecommendations(window);
  }
}
