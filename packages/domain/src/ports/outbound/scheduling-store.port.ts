import type { Route, WasteType } from '../../entities/route.js';
import type { TruckType, TruckTypeCode, TruckWithWasteType } from '../../entities/truck.js';
import type { DriverCandidate, Employee } from '../../entities/employee.js';
import type { Facility } from '../../entities/facility.js';
import type { Trip, TripFilter, TripKey, TripSlot } from '../../entities/trip.js';
import type { MaintenanceRecord } from '../../entities/maintenance.js';
import type { IsoDate } from '../../scheduling/calendar.js';
import type { SchedulingPolicy } from '../../scheduling/policy.js';

export type MaintenanceDuePolicy = Pick<
  SchedulingPolicy,
  'maintenanceIntervalDays' | 'maintenanceLookaheadDays'
>;

/**
 * Storage collaborator of the schedulers. Every list is returned in the
 * order noted on it; callers rely on that order for tie-breaks.
 */
export interface SchedulingStorePort {
  /** Run `fn` against a transactional handle: commit on resolve, roll back on reject. */
  withTransaction<T>(fn: (store: SchedulingStorePort) => Promise<T>): Promise<T>;

  // ─── Routes ────────────────────────────────────────────────────────────────
  findRoute(routeId: number): Promise<Route | null>;
  /** Ordered by id */
  listRoutesByWasteType(wasteType: WasteType): Promise<Route[]>;

  // ─── Trucks ────────────────────────────────────────────────────────────────
  findTruck(truckId: number): Promise<TruckWithWasteType | null>;
  /** Ordered by capacity descending, then id */
  listTrucksByWasteType(wasteType: WasteType): Promise<TruckWithWasteType[]>;
  findTruckType(code: TruckTypeCode): Promise<TruckType | null>;

  // ─── Facilities ────────────────────────────────────────────────────────────
  findFacility(facilityId: number): Promise<Facility | null>;
  /** Ordered by id */
  listFacilitiesByWasteType(wasteType: WasteType): Promise<Facility[]>;

  // ─── Drivers & employees ───────────────────────────────────────────────────
  /** Ordered by hire date, then employee id */
  listDrivers(): Promise<DriverCandidate[]>;
  isDriver(employeeId: number): Promise<boolean>;
  findEmployeesByName(name: string): Promise<Employee[]>;

  // ─── Trips ─────────────────────────────────────────────────────────────────
  /** Trips starting on any date in [fromDate, toDate], ordered by start time */
  listTripSlots(fromDate: IsoDate, toDate: IsoDate): Promise<TripSlot[]>;
  /** Ordered by start time, then route id */
  listTripsOnDate(filter: TripFilter, date: IsoDate): Promise<Trip[]>;
  listTripPairs(): Promise<Array<[number, number]>>;
  insertTrip(trip: Trip): Promise<void>;
  /** Returns the number of trips updated */
  updateTripFacility(keys: readonly TripKey[], facilityId: number): Promise<number>;

  // ─── Maintenance & technicians ─────────────────────────────────────────────
  listMaintenanceOnDate(date: IsoDate): Promise<MaintenanceRecord[]>;
  /** Trucks in the maintenance backlog on `date`, ordered by id */
  listMaintenanceDue(date: IsoDate, policy: MaintenanceDuePolicy): Promise<TruckWithWasteType[]>;
  /** Ordered by employee id */
  listQualifiedTechnicians(truckType: TruckTypeCode): Promise<Employee[]>;
  insertMaintenance(record: MaintenanceRecord): Promise<void>;
  hasTechnicianQualification(employeeId: number, truckType: TruckTypeCode): Promise<boolean>;
  insertTechnician(employeeId: number, truckType: TruckTypeCode): Promise<void>;
}
