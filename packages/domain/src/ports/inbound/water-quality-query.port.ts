import type { Recommendation } from '../../entities/recommendation.js';

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

export interface ReadingView {
  ph: number | null;
  turbidity: number | null;
  temperature: number | null;
  /** `YYYY-MM-DD HH:mm:ss`, UTC */
  timestamp: string;
}

// ---------------------------------------------------------------------------
// Inbound port
// ---------------------------------------------------------------------------

export interface WaterQualityQueryPort {
  listRecentReadings(limit?: number): Promise<ReadingView[]>;
  getRecommendations(): Promise<Recommendation>;
}
