import 'dotenv/config';
import { connect } from 'mqtt';
import { PoolSensorSimulator } from './simulation.js';

/**
 * Pool sensor emitter: publishes simulated water-quality readings.
 *
 * Env vars:
 *   MQTT_BROKER        : broker host (default: broker.hivemq.com)
 *   MQTT_PORT          : broker port (default: 1883)
 *   MQTT_TOPIC_PUBLISH : topic to publish on (default: pool/data)
 *   EMIT_INTERVAL_MS   : publish interval in ms (default: 5000)
 *   EMITTER_SEED       : seed for the random walk (default: current time)
 */

const MQTT_BROKER = process.env['MQTT_BROKER'] ?? 'broker.hivemq.com';
const MQTT_PORT = parseInt(process.env['MQTT_PORT'] ?? '1883', 10);
const TOPIC = process.env['MQTT_TOPIC_PUBLISH'] ?? 'pool/data';
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '5000', 10);
const SEED = parseInt(process.env['EMITTER_SEED'] ?? String(Date.now()), 10);

if (Number.isNaN(MQTT_PORT) || Number.isNaN(EMIT_INTERVAL_MS) || Number.isNaN(SEED)) {
  console.error('[emitter] MQTT_PORT, EMIT_INTERVAL_MS and EMITTER_SEED must be integers');
  process.exit(1);
}

const simulator = new PoolSensorSimulator({ seed: SEED });
const client = connect(`mqtt://${MQTT_BROKER}:${MQTT_PORT}`, {
  clientId: `poolwatch-emitter-${SEED}`,
  reconnectPeriod: 5_000,
});

client.on('connect', () => console.log(`[emitter] connected to ${MQTT_BROKER}:${MQTT_PORT}`));
client.on('error', (err) => console.error('[emitter] client error:', err.message));

async function emit(): Promise<void> {
  // Readings taken while offline are dropped rather than queued
  if (!client.connected) return;

  const payload = JSON.stringify(simulator.step());
  try {
    await client.publishAsync(TOPIC, payload, { qos: 0 });
    console.log(`[emitter] published ${payload}`);
  } catch (err) {
    console.error('[emitter] publish failed', err instanceof Error ? err.message : err);
  }
}

console.log(`[emitter] starting, topic ${TOPIC} every ${EMIT_INTERVAL_MS}ms (seed ${SEED})`);
const timer = setInterval(() => void emit(), EMIT_INTERVAL_MS);

const shutdown = () => {
  clearInterval(timer);
  client.end(false, {}, () => process.exit(0));
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
