import { z } from 'zod';
import { StorageError } from '@poolwatch/domain';
import type {
  NewSensorReading,
  ReadingRepositoryPort,
  SensorReading,
  StorageOperation,
} from '@poolwatch/domain';
import { withClient } from './pool.js';
import type { DbClient, DbPool } from './pool.js';

const readingRowSchema = z.object({
  ph: z.number().nullable(),
  turbidity: z.number().nullable(),
  temperature: z.number().nullable(),
  timestamp: z.date(),
});

export class PgReadingRepository implements ReadingRepositoryPort {
  constructor(private readonly pool: DbPool) {}

  async insertReading(reading: NewSensorReading): Promise<void> {
    await this.run('insert', (client) =>
      client.query(
        `INSERT INTO sensor_data (ph, turbidity, temperature)
         VALUES ($1, $2, $3)`,
        [reading.ph, reading.turbidity, reading.temperature],
      ),
    );
  }

  async queryRecent(limit: number): Promise<SensorReading[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    const { rows } = await this.run('query', (client) =>
      client.query(
        `SELECT ph, turbidity, temperature, "timestamp"
         FROM sensor_data
         ORDER BY "timestamp" DESC, id DESC
         LIMIT $1`,
        [limit],
      ),
    );
    return rows.map(mapReadingRow);
  }

  private async run<T>(
    operation: StorageOperation,
    fn: (client: DbClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await withClient(this.pool, fn);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new StorageError(operation, `sensor_data ${operation} failed: ${reason}`, { cause: err });
    }
  }
}

function mapReadingRow(row: unknown): SensorReading {
  const parsed = readingRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError('query', 'sensor_data row has an unexpected shape', {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
