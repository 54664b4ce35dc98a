export interface SchedulingPolicy {
  /** First hour of the working day a trip may start at */
  readonly workdayStartHour: number;
  /** Hour by which every trip must have ended */
  readonly workdayEndHour: number;
  readonly averageSpeedKph: number;
  /** Buffer kept on both sides of a trip; also the gap between batched trips */
  readonly tripBufferMinutes: number;
  /** A truck is due once its latest maintenance is older than this */
  readonly maintenanceIntervalDays: number;
  /** Due trucks with a maintenance booked within this many days are left alone */
  readonly maintenanceLookaheadDays: number;
  /** Days searched forward for a free technician before giving up on a truck */
  readonly maintenanceSearchHorizonDays: number;
  /** Skip maintenance days on which the truck has a trip or another maintenance */
  readonly requireIdleTruckForMaintenance: boolean;
}

export const DEFAULT_SCHEDULING_POLICY: SchedulingPolicy = {
  workdayStartHour: 8,
  workdayEndHour: 16,
  averageSpeedKph: 5,
  tripBufferMinutes: 30,
  maintenanceIntervalDays: 90,
  maintenanceLookaheadDays: 10,
  maintenanceSearchHorizonDays: 365,
  requireIdleTruckForMaintenance: true,
};

export function tripDurationHours(lengthKm: number, policy: SchedulingPolicy): number {
  return lengthKm / policy.averageSpeedKph;
}
