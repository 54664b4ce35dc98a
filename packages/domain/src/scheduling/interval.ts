import { addHours, addMinutes } from './calendar.js';
import { tripDurationHours, type SchedulingPolicy } from './policy.js';
import type { TripSlot } from '../entities/trip.js';

export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * SQL `OVERLAPS` on two periods: each is half-open, so periods that only
 * touch do not overlap; periods sharing a start always do.
 */
export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  const aStart = a.start.getTime();
  const bStart = b.start.getTime();
  if (aStart === bStart) return true;
  return aStart < b.end.getTime() && bStart < a.end.getTime();
}

export function bufferedWindow(window: TimeWindow, minutes: number): TimeWindow {
  return { start: addMinutes(window.start, -minutes), end: addMinutes(window.end, minutes) };
}

export function tripWindow(start: Date, lengthKm: number, policy: SchedulingPolicy): TimeWindow {
  return { start, end: addHours(start, tripDurationHours(lengthKm, policy)) };
}

/** Whether an existing trip blocks its truck and drivers during `window`. */
export function tripBlocks(slot: TripSlot, window: TimeWindow, policy: SchedulingPolicy): boolean {
  const busy = bufferedWindow(tripWindow(slot.startTime, slot.lengthKm, policy), policy.tripBufferMinutes);
  return overlaps(busy, window);
}
