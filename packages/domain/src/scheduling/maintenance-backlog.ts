import { daysBetween, type IsoDate } from './calendar.js';
import type { SchedulingPolicy } from './policy.js';

/**
 * A truck is due when its latest maintenance is older than the interval and
 * nothing is booked for it within the lookahead. Trucks that were never
 * maintained are not due.
 */
export function isMaintenanceDue(
  history: readonly IsoDate[],
  date: IsoDate,
  policy: Pick<SchedulingPolicy, 'maintenanceIntervalDays' | 'maintenanceLookaheadDays'>,
): boolean {
  if (history.length === 0) return false;

  const latest = history.reduce((max, d) => (d > max ? d : max));
  if (daysBetween(latest, date) <= policy.maintenanceIntervalDays) return false;

  return !history.some((d) => {
    const ahead = daysBetween(date, d);
    return ahead >= 0 && ahead <= policy.maintenanceLookaheadDays;
  });
}
