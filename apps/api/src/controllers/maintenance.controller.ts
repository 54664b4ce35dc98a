import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SchedulingServices } from '../services/scheduling/index.js';
import { dateBodySchema, sendFailure } from './shared/scheduling-http.js';

export function createMaintenanceRouter(
  services: Pick<SchedulingServices, 'maintenance'>,
): Router {
  const router = Router();

  /** POST /api/maintenance/schedule */
  router.post('/schedule', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { date } = dateBodySchema.parse(req.body);
      const outcome = await services.maintenance.scheduleMaintenance(date);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.json({ data: outcome.value, scheduled: outcome.value.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
