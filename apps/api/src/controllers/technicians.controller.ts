import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { QualificationRecord } from '@waste-ops/domain';
import { parseQualificationRecords } from '@waste-ops/domain';
import type { SchedulingServices } from '../services/scheduling/index.js';
import { sendFailure } from './shared/scheduling-http.js';

const qualificationRecordSchema = z.object({
  firstName: z.string().trim().min(1),
  lastName: z.string().trim().min(1),
  truckType: z.string().trim().min(1),
});

const qualificationsBodySchema = z.object({
  records: z.array(qualificationRecordSchema).max(10_000),
});

// Plain text bodies are qualification files; JSON bodies carry parsed records.
function readRecords(body: unknown): QualificationRecord[] {
  if (typeof body === 'string') return parseQualificationRecords(body);
  return qualificationsBodySchema.parse(body).records;
}

export function createTechniciansRouter(
  services: Pick<SchedulingServices, 'qualifications'>,
): Router {
  const router = Router();

  /** POST /api/technicians/qualifications */
  router.post('/qualifications', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const records = readRecords(req.body);
      const outcome = await services.qualifications.updateTechnicians(records);
      if (!outcome.ok) return sendFailure(res, outcome.error);
      return res.json({
        inserted: outcome.value.inserted.length,
        rejected: outcome.value.rejected,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
