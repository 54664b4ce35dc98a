import type { Response } from 'express';
import { z } from 'zod';
import type { SchedulingErrorKind, Trip } from '@waste-ops/domain';
import { formatWallClock, isIsoDate, parseWallClock } from '@waste-ops/domain';

export const idParam = z.coerce.number().int().positive();

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });

export const wallClockSchema = z.string().transform((value, ctx) => {
  const parsed = parseWallClock(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected YYYY-MM-DDTHH:mm[:ss] without offset' });
    return z.NEVER;
  }
  return parsed;
});

export const dateBodySchema = z.object({ date: isoDateSchema });

export function statusForKind(kind: SchedulingErrorKind): number {
  if (kind.startsWith('INVALID_')) return 404;
  if (kind === 'WORKING_HOURS_VIOLATION') return 422;
  if (kind === 'STORAGE_FAILURE') return 503;
  return 409;
}

export function sendFailure(res: Response, kind: SchedulingErrorKind): Response {
  return res.status(statusForKind(kind)).json({ error: kind });
}

/** Trip as sent over HTTP: start time in store literal form. */
export function serializeTrip(trip: Trip): Omit<Trip, 'startTime'> & { startTime: string } {
  return { ...trip, startTime: formatWallClock(trip.startTime) };
}
