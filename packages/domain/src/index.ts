// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/sensor-reading.js';
export * from './entities/recommendation.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/water-quality-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/reading-repository.port.js';
