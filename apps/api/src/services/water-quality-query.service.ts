import type {
  Recommendation,
  ReadingRepositoryPort,
  ReadingView,
  SensorReading,
  WaterQualityQueryPort,
} from '@poolwatch/domain';
import type { TrendPredictor } from './prediction/trend-predictor.js';

export const RECENT_READINGS_LIMIT = 50;

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function formatTimestamp(ts: Date): string {
  return (
    `${ts.getUTCFullYear()}-${pad(ts.getUTCMonth() + 1)}-${pad(ts.getUTCDate())} ` +
    `${pad(ts.getUTCHours())}:${pad(ts.getUTCMinutes())}:${pad(ts.getUTCSeconds())}`
  );
}

function toView(reading: SensorReading): ReadingView {
  return {
    ph: reading.ph,
    turbidity: reading.turbidity,
    temperature: reading.temperature,
    timestamp: formatTimestamp(reading.timestamp),
  };
}

export class WaterQualityQueryService implements WaterQualityQueryPort {
  constructor(
    private readonly readings: ReadingRepositoryPort,
    private readonly predictor: Pick<TrendPredictor, 'recommend'>,
  ) {}

  async listRecentReadings(limit: number = RECENT_READINGS_LIMIT): Promise<ReadingView[]> {
    const rows = await this.readings.queryRecent(limit);
    return rows.map(toView);
  }

  getRecommendations(): Promise<Recommendation> {
    return this.predictor.recommend();
  }
}
