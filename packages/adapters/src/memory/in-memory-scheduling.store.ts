import type {
  DriverCandidate,
  Employee,
  Facility,
  IsoDate,
  MaintenanceDuePolicy,
  MaintenanceRecord,
  Qualification,
  Route,
  SchedulingStorePort,
  Trip,
  TripFilter,
  TripKey,
  TripSlot,
  Truck,
  TruckType,
  TruckTypeCode,
  TruckWithWasteType,
  WasteType,
} from '@waste-ops/domain';
import { compareByExperience, isMaintenanceDue, toIsoDate } from '@waste-ops/domain';

export interface SchedulingDataset {
  truckTypes: TruckType[];
  trucks: Truck[];
  employees: Employee[];
  drivers: Qualification[];
  technicians: Qualification[];
  facilities: Facility[];
  routes: Route[];
  trips: Trip[];
  maintenance: MaintenanceRecord[];
}

function emptyDataset(): SchedulingDataset {
  return {
    truckTypes: [],
    trucks: [],
    employees: [],
    drivers: [],
    technicians: [],
    facilities: [],
    routes: [],
    trips: [],
    maintenance: [],
  };
}

/**
 * Process-local store holding the whole dataset in arrays. Transactions
 * snapshot the dataset and restore it when the callback rejects.
 * Assumes a single writer, like the schedulers themselves.
 */
export class InMemorySchedulingStore implements SchedulingStorePort {
  private data: SchedulingDataset;

  constructor(seed: Partial<SchedulingDataset> = {}) {
    this.data = structuredClone({ ...emptyDataset(), ...seed });
  }

  /** Copy of the current contents, for inspection. */
  snapshot(): SchedulingDataset {
    return structuredClone(this.data);
  }

  async withTransaction<T>(fn: (store: SchedulingStorePort) => Promise<T>): Promise<T> {
    const before = structuredClone(this.data);
    try {
      return await fn(this);
    } catch (err) {
      this.data = before;
      throw err;
    }
  }

  // ─── Routes ──────────────────────────────────────────────────────────────────

  async findRoute(routeId: number): Promise<Route | null> {
    return this.data.routes.find((r) => r.id === routeId) ?? null;
  }

  async listRoutesByWasteType(wasteType: WasteType): Promise<Route[]> {
    return this.data.routes.filter((r) => r.wasteType === wasteType).sort((a, b) => a.id - b.id);
  }

  // ─── Trucks ──────────────────────────────────────────────────────────────────

  async findTruck(truckId: number): Promise<TruckWithWasteType | null> {
    const truck = this.data.trucks.find((t) => t.id === truckId);
    return truck ? this.withWasteType(truck) : null;
  }

  async listTrucksByWasteType(wasteType: WasteType): Promise<TruckWithWasteType[]> {
    return this.data.trucks
      .map((t) => this.withWasteType(t))
      .filter((t): t is TruckWithWasteType => t?.wasteType === wasteType)
      .sort((a, b) => b.capacity - a.capacity || a.id - b.id);
  }

  async findTruckType(code: TruckTypeCode): Promise<TruckType | null> {
    return this.data.truckTypes.find((tt) => tt.code === code) ?? null;
  }

  // ─── Facilities ──────────────────────────────────────────────────────────────

  async findFacility(facilityId: number): Promise<Facility | null> {
    return this.data.facilities.find((f) => f.id === facilityId) ?? null;
  }

  async listFacilitiesByWasteType(wasteType: WasteType): Promise<Facility[]> {
    return this.data.facilities
      .filter((f) => f.wasteType === wasteType)
      .sort((a, b) => a.id - b.id);
  }

  // ─── Drivers & employees ─────────────────────────────────────────────────────

  async listDrivers(): Promise<DriverCandidate[]> {
    const truckTypes = new Map<number, Set<TruckTypeCode>>();
    for (const q of this.data.drivers) {
      const types = truckTypes.get(q.employeeId) ?? new Set<TruckTypeCode>();
      types.add(q.truckType);
      truckTypes.set(q.employeeId, types);
    }

    const candidates: DriverCandidate[] = [];
    for (const employee of this.data.employees) {
      const types = truckTypes.get(employee.id);
      if (types) candidates.push({ employeeId: employee.id, hireDate: employee.hireDate, truckTypes: types });
    }
    return candidates.sort(compareByExperience);
  }

  async isDriver(employeeId: number): Promise<boolean> {
    return this.data.drivers.some((q) => q.employeeId === employeeId);
  }

  async findEmployeesByName(name: string): Promise<Employee[]> {
    return this.data.employees.filter((e) => e.name === name).sort((a, b) => a.id - b.id);
  }

  // ─── Trips ───────────────────────────────────────────────────────────────────

  async listTripSlots(fromDate: IsoDate, toDate: IsoDate): Promise<TripSlot[]> {
    const slots: TripSlot[] = [];
    for (const trip of this.data.trips) {
      const date = toIsoDate(trip.startTime);
      const route = this.data.routes.find((r) => r.id === trip.routeId);
      if (date < fromDate || date > toDate || !route) continue;
      slots.push({ ...trip, lengthKm: route.lengthKm });
    }
    return slots.sort(compareTrips);
  }

  async listTripsOnDate(filter: TripFilter, date: IsoDate): Promise<Trip[]> {
    return this.data.trips
      .filter((t) => matchesFilter(t, filter) && toIsoDate(t.startTime) === date)
      .sort(compareTrips);
  }

  async listTripPairs(): Promise<Array<[number, number]>> {
    return this.data.trips.map((t): [number, number] => [t.driverHigh, t.driverLow]);
  }

  async insertTrip(trip: Trip): Promise<void> {
    const clash = this.data.trips.some(
      (t) => t.routeId === trip.routeId && t.startTime.getTime() === trip.startTime.getTime(),
    );
    if (clash) {
      throw new Error(`trip for route ${trip.routeId} at ${trip.startTime.toISOString()} already exists`);
    }
    this.data.trips.push({ ...trip, startTime: new Date(trip.startTime.getTime()) });
  }

  async updateTripFacility(keys: readonly TripKey[], facilityId: number): Promise<number> {
    let updated = 0;
    this.data.trips = this.data.trips.map((trip) => {
      const hit = keys.some(
        (k) => k.routeId === trip.routeId && k.startTime.getTime() === trip.startTime.getTime(),
      );
      if (!hit) return trip;
      updated += 1;
      return { ...trip, facilityId };
    });
    return updated;
  }

  // ─── Maintenance & technicians ───────────────────────────────────────────────

  async listMaintenanceOnDate(date: IsoDate): Promise<MaintenanceRecord[]> {
    return this.data.maintenance
      .filter((m) => m.date === date)
      .sort((a, b) => a.truckId - b.truckId);
  }

  async listMaintenanceDue(
    date: IsoDate,
    policy: MaintenanceDuePolicy,
  ): Promise<TruckWithWasteType[]> {
    const due: TruckWithWasteType[] = [];
    for (const truck of [...this.data.trucks].sort((a, b) => a.id - b.id)) {
      const history = this.data.maintenance.filter((m) => m.truckId === truck.id).map((m) => m.date);
      const withType = this.withWasteType(truck);
      if (withType && isMaintenanceDue(history, date, policy)) due.push(withType);
    }
    return due;
  }

  async listQualifiedTechnicians(truckType: TruckTypeCode): Promise<Employee[]> {
    const ids = new Set(
      this.data.technicians.filter((q) => q.truckType === truckType).map((q) => q.employeeId),
    );
    return this.data.employees.filter((e) => ids.has(e.id)).sort((a, b) => a.id - b.id);
  }

  async insertMaintenance(record: MaintenanceRecord): Promise<void> {
    if (this.data.maintenance.some((m) => m.truckId === record.truckId && m.date === record.date)) {
      throw new Error(`truck ${record.truckId} already has maintenance on ${record.date}`);
    }
    this.data.maintenance.push({ ...record });
  }

  async hasTechnicianQualification(
    employeeId: number,
    truckType: TruckTypeCode,
  ): Promise<boolean> {
    return this.data.technicians.some(
      (q) => q.employeeId === employeeId && q.truckType === truckType,
    );
  }

  async insertTechnician(employeeId: number, truckType: TruckTypeCode): Promise<void> {
    this.data.technicians.push({ employeeId, truckType });
  }

  private withWasteType(truck: Truck): TruckWithWasteType | null {
    const type = this.data.truckTypes.find((tt) => tt.code === truck.truckType);
    return type ? { ...truck, wasteType: type.wasteType } : null;
  }
}

function matchesFilter(trip: Trip, filter: TripFilter): boolean {
  if ('routeId' in filter) return trip.routeId === filter.routeId;
  if ('truckId' in filter) return trip.truckId === filter.truckId;
  return trip.facilityId === filter.facilityId;
}

function compareTrips(a: Trip, b: Trip): number {
  return a.startTime.getTime() - b.startTime.getTime() || a.routeId - b.routeId;
}
