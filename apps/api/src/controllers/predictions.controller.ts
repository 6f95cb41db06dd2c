import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { WaterQualityQueryPort } from '@poolwatch/domain';

export function createPredictionsRouter(query: WaterQualityQueryPort): Router {
  const router = Router();

  /** GET /api/predictive_maintenance - one-hour trend recommendations */
  router.get('/predictive_maintenance', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await query.getRecommendations());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
