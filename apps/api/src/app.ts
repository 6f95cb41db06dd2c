import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';
import type { WaterQualityQueryPort } from '@poolwatch/domain';

import { createReadingsRouter } from './controllers/readings.controller.js';
import { createPredictionsRouter } from './controllers/predictions.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDependencies {
  queryService: WaterQualityQueryPort;
  /** Reported by /healthz; the listener owns the broker connection. */
  isBrokerConnected?: () => boolean;
  corsOrigin?: string;
}

export function buildApp(deps: AppDependencies): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api', createReadingsRouter(deps.queryService));
  app.use('/api', createPredictionsRouter(deps.queryService));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      mqtt: deps.isBrokerConnected?.() ? 'connected' : 'disconnected',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>): Server {
  return createServer(app);
}
