// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, closePool, withClient } from './postgres/pool.js';
export type { DbPool, DbClient, DbPoolOptions } from './postgres/pool.js';
export { PgReadingRepository } from './postgres/reading.repository.js';

// ─── MQTT Adapter ─────────────────────────────────────────────────────────────
export { MqttTelemetryListener } from './mqtt/mqtt-telemetry.listener.js';
export type {
  MessageHandler,
  MqttConnectFn,
  MqttListenerOptions,
} from './mqtt/mqtt-telemetry.listener.js';
