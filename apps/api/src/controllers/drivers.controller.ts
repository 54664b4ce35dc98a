import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SchedulingServices } from '../services/scheduling/index.js';
import { idParam, sendFailure } from './shared/scheduling-http.js';

export function createDriversRouter(services: Pick<SchedulingServices, 'workmates'>): Router {
  const router = Router();

  /** GET /api/drivers/:driverId/workmates */
  router.get('/:driverId/workmates', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const driverId = idParam.parse(req.params['driverId']);
      const outcome = await services.workmates.workmateSphere(driverId);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.json({ data: outcome.value });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
