import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { WaterQualityQueryPort } from '@poolwatch/domain';

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(50),
});

export function createReadingsRouter(query: WaterQualityQueryPort): Router {
  const router = Router();

  /** GET /api/data - most recent readings, newest first */
  router.get('/data', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = recentQuerySchema.parse(req.query);
      const readings = await query.listRecentReadings(limit);
      res.json(readings);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
