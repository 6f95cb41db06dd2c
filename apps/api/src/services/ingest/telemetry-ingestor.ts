import { z } from 'zod';
import { METRIC_FIELDS, ParseError, StorageError } from '@poolwatch/domain';
import type {
  IngestOutcome,
  MetricField,
  NewSensorReading,
  ReadingRepositoryPort,
  TelemetryIngestionPort,
} from '@poolwatch/domain';

const utf8 = new TextDecoder('utf-8', { fatal: true });

const payloadObjectSchema = z.record(z.unknown());
const metricValueSchema = z.number().finite().nullable();

export interface ParsedPayload {
  reading: NewSensorReading;
  /** Fields that were present but not numeric; stored as null. */
  droppedFields: MetricField[];
}

/**
 * Decode a broker payload into a reading.
 * Throws ParseError unless the payload is a JSON object in valid UTF-8.
 */
export function parseReadingPayload(payload: Buffer | string): ParsedPayload {
  let text: string;
  if (typeof payload === 'string') {
    text = payload;
  } else {
    try {
      text = utf8.decode(payload);
    } catch (err) {
      throw new ParseError('payload is not valid UTF-8', payload.toString('hex'), { cause: err });
    }
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError('payload is not valid JSON', text, { cause: err });
  }

  const obj = payloadObjectSchema.safeParse(data);
  if (!obj.success) {
    throw new ParseError('payload is not a JSON object', text, { cause: obj.error });
  }

  const droppedFields: MetricField[] = [];
  const valueOf = (field: MetricField): number | null => {
    const raw = obj.data[field];
    if (raw === undefined) return null;
    const value = metricValueSchema.safeParse(raw);
    if (value.success) return value.data;
    droppedFields.push(field);
    return null;
  };

  return {
    reading: {
      ph: valueOf('ph'),
      turbidity: valueOf('turbidity'),
      temperature: valueOf('temperature'),
    },
    droppedFields,
  };
}

export class TelemetryIngestor implements TelemetryIngestionPort {
  constructor(private readonly readings: ReadingRepositoryPort) {}

  async handleMessage(payload: Buffer | string): Promise<IngestOutcome> {
    let parsed: ParsedPayload;
    try {
      parsed = parseReadingPayload(payload);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      console.error(`[ingestor] ${err.message}, dropping message: ${err.payload}`);
      return { ok: false, error: err };
    }

    const { reading, droppedFields } = parsed;
    if (droppedFields.length > 0) {
      console.warn(`[ingestor] non-numeric ${droppedFields.join(', ')} stored as null`);
    }
    console.log(
      `[ingestor] received ${METRIC_FIELDS.map((f) => `${f}=${reading[f] ?? 'null'}`).join(' ')}`,
    );

    try {
      await this.readings.insertReading(reading);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      console.error(`[ingestor] ${err.message}, dropping message`);
      return { ok: false, error: err };
    }

    console.log('[ingestor] reading stored');
    return { ok: true, reading };
  }
}
