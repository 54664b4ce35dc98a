import type { Route } from '../entities/route.js';
import { addMinutes, atWallClock, type IsoDate } from './calendar.js';
import { tripWindow, type TimeWindow } from './interval.js';
import type { SchedulingPolicy } from './policy.js';

export interface PackedTrip {
  readonly route: Route;
  readonly window: TimeWindow;
}

/**
 * Lay routes back to back from the start of the working day, leaving the trip
 * buffer between consecutive trips. Packing stops at the first route that
 * would not end strictly before the end of the day; later routes are not tried.
 */
export function packRoutes(
  routes: readonly Route[],
  date: IsoDate,
  policy: SchedulingPolicy,
): PackedTrip[] {
  const dayEnd = atWallClock(date, policy.workdayEndHour).getTime();
  const packed: PackedTrip[] = [];
  let cursor = atWallClock(date, policy.workdayStartHour);

  for (const route of routes) {
    const window = tripWindow(cursor, route.lengthKm, policy);
    if (window.end.getTime() >= dayEnd) break;
    packed.push({ route, window });
    cursor = addMinutes(window.end, policy.tripBufferMinutes);
  }
  return packed;
}
