import {
  MqttTelemetryListener,
  PgReadingRepository,
  closePool,
  createPool,
} from '@poolwatch/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/env.js';
import { TelemetryIngestor } from './services/ingest/telemetry-ingestor.js';
import { TrendPredictor } from './services/prediction/trend-predictor.js';
import { WaterQualityQueryService } from './services/water-quality-query.service.js';

async function main() {
  const config = loadConfig();

  // Verify DB connection
  const pool = createPool(config.db);
  await pool.query('SELECT 1');
  console.log(`[server] database connected (${config.db.host}:${config.db.port}/${config.db.database})`);

  const readings = new PgReadingRepository(pool);
  const ingestor = new TelemetryIngestor(readings);
  const queryService = new WaterQualityQueryService(readings, new TrendPredictor(readings));

  const listener = new MqttTelemetryListener(config.mqtt, (payload) => ingestor.handleMessage(payload));
  listener.start();

  const app = buildApp({
    queryService,
    isBrokerConnected: () => listener.isConnected(),
    corsOrigin: config.corsOrigin,
  });
  const httpServer = buildHttpServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await listener.stop();
    await closePool(pool);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
