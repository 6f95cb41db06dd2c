import { describe, it, expect } from '@jest/globals';
import { StorageError } from '@poolwatch/domain';
import type { SensorReading } from '@poolwatch/domain';
import { TrendPredictor } from '../prediction/trend-predictor.js';
import { WaterQualityQueryService, formatTimestamp } from '../water-quality-query.service.js';
import { InMemoryReadingRepository, storageDown } from '../../__tests__/support/in-memory-reading.repository.js';

function readingsEveryMinute(count: number): SensorReading[] {
  const start = Date.UTC(2026, 0, 5, 8, 0, 0);
  return Array.from({ length: count }, (_, i) => ({
    ph: 7.5,
    turbidity: null,
    temperature: 20 + i,
    timestamp: new Date(start + i * 60_000),
  }));
}

describe('formatTimestamp', () => {
  it('formats in UTC with zero padding', () => {
    expect(formatTimestamp(new Date('2026-01-05T08:03:09.750Z'))).toBe('2026-01-05 08:03:09');
  });
});

describe('WaterQualityQueryService', () => {
  it('returns at most 50 readings, newest first', async () => {
    const repo = new InMemoryReadingRepository().seed(readingsEveryMinute(70));
    const service = new WaterQualityQueryService(repo, new TrendPredictor(repo));

    const views = await service.listRecentReadings();

    expect(views).toHaveLength(50);
    expect(views[0]).toEqual({ ph: 7.5, turbidity: null, temperature: 89, timestamp: '2026-01-05 09:09:00' });
    expect(views[49]?.timestamp).toBe('2026-01-05 08:20:00');
    const times = views.map((v) => v.timestamp);
    expect([...times].sort().reverse()).toEqual(times);
  });

  it('returns every reading when fewer than the limit exist', async () => {
    const repo = new InMemoryReadingRepository().seed(readingsEveryMinute(3));
    const service = new WaterQualityQueryService(repo, new TrendPredictor(repo));

    await expect(service.listRecentReadings()).resolves.toHaveLength(3);
  });

  it('delegates recommendations to the predictor', async () => {
    const repo = new InMemoryReadingRepository().seed(readingsEveryMinute(2));
    const service = new WaterQualityQueryService(repo, new TrendPredictor(repo));

    await expect(service.getRecommendations()).resolves.toEqual({
      status: 'Not enough data for accurate prediction.',
    });
  });

  it('lets storage failures reach the caller', async () => {
    const repo = new InMemoryReadingRepository();
    repo.failQueries = storageDown('query');
    const service = new WaterQualityQueryService(repo, new TrendPredictor(repo));

    await expect(service.listRecentReadings()).rejects.toBeInstanceOf(StorageError);
    await expect(service.getRecommendations()).rejects.toBeInstanceOf(StorageError);
  });
});
