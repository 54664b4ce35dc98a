export interface TripKey {
  readonly routeId: number;
  readonly startTime: Date;
}

/**
 * A scheduled collection trip. The two drivers form an unordered pair stored
 * as (max, min) in driverHigh / driverLow.
 */
export interface Trip extends TripKey {
  readonly truckId: number;
  readonly volume: number | null;
  readonly driverHigh: number;
  readonly driverLow: number;
  readonly facilityId: number;
}

/** Trip joined with its route length, enough to derive its time window */
export interface TripSlot extends Trip {
  readonly lengthKm: number;
}

export type TripFilter =
  | { readonly routeId: number }
  | { readonly truckId: number }
  | { readonly facilityId: number };
