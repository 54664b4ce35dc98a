import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SchedulingServices } from '../services/scheduling/index.js';
import {
  dateBodySchema,
  idParam,
  sendFailure,
  serializeTrip,
  wallClockSchema,
} from './shared/scheduling-http.js';

const createTripBodySchema = z.object({
  routeId: z.number().int().positive(),
  startTime: wallClockSchema,
});

/** /api/trips */
export function createTripsRouter(services: Pick<SchedulingServices, 'trips'>): Router {
  const router = Router();

  /** POST /api/trips */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createTripBodySchema.parse(req.body);
      const outcome = await services.trips.scheduleTrip(body.routeId, body.startTime);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.status(201).json({ data: serializeTrip(outcome.value) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

/** /api/trucks */
export function createTrucksRouter(services: Pick<SchedulingServices, 'batches'>): Router {
  const router = Router();

  /** POST /api/trucks/:truckId/trips */
  router.post('/:truckId/trips', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const truckId = idParam.parse(req.params['truckId']);
      const { date } = dateBodySchema.parse(req.body);
      const outcome = await services.batches.scheduleTrips(truckId, date);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.json({ data: outcome.value.map(serializeTrip), scheduled: outcome.value.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

/** /api/facilities */
export function createFacilitiesRouter(services: Pick<SchedulingServices, 'reroute'>): Router {
  const router = Router();

  /** POST /api/facilities/:facilityId/reroute */
  router.post('/:facilityId/reroute', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const facilityId = idParam.parse(req.params['facilityId']);
      const { date } = dateBodySchema.parse(req.body);
      const outcome = await services.reroute.rerouteWaste(facilityId, date);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.json({ rerouted: outcome.value.rerouted, facilityId: outcome.value.facilityId });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
