import type { NewSensorReading, SensorReading } from '../../entities/sensor-reading.js';

/**
 * Storage Gateway for the reading history.
 * Implementations acquire and release their own connection on every call.
 */
export interface ReadingRepositoryPort {
  /** Rejects with StorageError when the write fails. */
  insertReading(reading: NewSensorReading): Promise<void>;
  /** At most `limit` rows, newest first. Rejects with StorageError. */
  queryRecent(limit: number): Promise<SensorReading[]>;
}
