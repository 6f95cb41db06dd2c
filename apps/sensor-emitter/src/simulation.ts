import { METRIC_FIELDS } from '@poolwatch/domain';
import type { MetricField } from '@poolwatch/domain';

/** Uniform draw in [0, 1). */
export type Rng = () => number;

/** mulberry32: a given EMITTER_SEED always replays the same sensor run. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 2 ** 32;
  };
}

/** Symmetric noise in [-amplitude, amplitude). */
export function noise(rng: Rng, amplitude: number): number {
  return (rng() * 2 - 1) * amplitude;
}

interface MetricModel {
  target: number;
  /** Fraction of the distance to target recovered per step */
  pull: number;
  jitter: number;
  min: number;
  max: number;
}

const MODELS: Record<MetricField, MetricModel> = {
  ph: { target: 7.5, pull: 0.05, jitter: 0.03, min: 6.5, max: 8.5 },
  turbidity: { target: 1.5, pull: 0.05, jitter: 0.15, min: 0, max: 20 },
  temperature: { target: 27, pull: 0.02, jitter: 0.1, min: 15, max: 35 },
};

export type SensorPayload = Partial<Record<MetricField, number>>;

export interface SimulatorOptions {
  seed: number;
  /** Probability that a sensor reports nothing on a given tick */
  dropoutRate?: number;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

/** Mean-reverting random walk around healthy pool chemistry. */
export class PoolSensorSimulator {
  private readonly rng: Rng;
  private readonly dropoutRate: number;
  private readonly state: Record<MetricField, number>;

  constructor(opts: SimulatorOptions) {
    this.rng = createRng(opts.seed);
    this.dropoutRate = opts.dropoutRate ?? 0.02;
    this.state = {
      ph: MODELS.ph.target,
      turbidity: MODELS.turbidity.target,
      temperature: MODELS.temperature.target,
    };
  }

  step(): SensorPayload {
    const payload: SensorPayload = {};
    for (const field of METRIC_FIELDS) {
      const m = MODELS[field];
      const drift = (m.target - this.state[field]) * m.pull;
      const next = this.state[field] + drift + noise(this.rng, m.jitter);
      this.state[field] = Math.min(m.max, Math.max(m.min, next));

      if (this.rng() >= this.dropoutRate) {
        payload[field] = round2(this.state[field]);
      }
    }
    return payload;
  }
}
