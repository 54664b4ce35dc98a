import type { DriverCandidate } from '../entities/employee.js';
import type { TruckTypeCode } from '../entities/truck.js';

export interface DriverPair {
  readonly first: DriverCandidate;
  readonly second: DriverCandidate;
}

/** Most experienced first: earlier hire date, then lower employee id. */
export function compareByExperience(a: DriverCandidate, b: DriverCandidate): number {
  if (a.hireDate !== b.hireDate) return a.hireDate < b.hireDate ? -1 : 1;
  return a.employeeId - b.employeeId;
}

export function pickSecondDriver(
  candidates: readonly DriverCandidate[],
  excludeId: number,
  requiredType: TruckTypeCode,
): DriverCandidate | null {
  return (
    candidates.find((c) => c.employeeId !== excludeId && c.truckTypes.has(requiredType)) ?? null
  );
}

/**
 * Pair the most experienced candidate with a partner so that at least one of
 * the two may drive `truckType`. Candidates must already be in experience
 * order; returns null when no such pair exists.
 */
export function pickDriverPair(
  candidates: readonly DriverCandidate[],
  truckType: TruckTypeCode,
): DriverPair | null {
  const [first, ...rest] = candidates;
  if (!first) return null;

  const second = first.truckTypes.has(truckType)
    ? rest.find((c) => c.employeeId !== first.employeeId) ?? null
    : pickSecondDriver(rest, first.employeeId, truckType);

  return second ? { first, second } : null;
}

export function orderedPair(pair: DriverPair): { driverHigh: number; driverLow: number } {
  const a = pair.first.employeeId;
  const b = pair.second.employeeId;
  return { driverHigh: Math.max(a, b), driverLow: Math.min(a, b) };
}
