import type { NewSensorReading } from '../../entities/sensor-reading.js';
import type { ParseError, StorageError } from '../../errors.js';

export type IngestOutcome =
  | { ok: true; reading: NewSensorReading }
  | { ok: false; error: ParseError | StorageError };

export interface TelemetryIngestionPort {
  /** Handles one broker message. Resolves with the outcome; never rejects for a bad message. */
  handleMessage(payload: Buffer | string): Promise<IngestOutcome>;
}
