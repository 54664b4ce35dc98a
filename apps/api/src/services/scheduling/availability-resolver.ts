import type {
  DriverCandidate,
  IsoDate,
  SchedulingPolicy,
  SchedulingStorePort,
  TimeWindow,
  TruckWithWasteType,
  WasteType,
} from '@waste-ops/domain';
import { addDays, toIsoDate, tripBlocks } from '@waste-ops/domain';

interface Commitments {
  readonly trucks: ReadonlySet<number>;
  readonly drivers: ReadonlySet<number>;
}

/**
 * Works out which trucks and drivers are free, from the trips and maintenance
 * already in the store. Bind it to the transactional handle of the operation
 * that uses it.
 */
export class AvailabilityResolver {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly policy: SchedulingPolicy,
  ) {}

  /** Trucks carrying `wasteType` that are free during `window`, in store order. */
  async availableTrucks(window: TimeWindow, wasteType: WasteType): Promise<TruckWithWasteType[]> {
    const [trucks, busy] = await Promise.all([
      this.store.listTrucksByWasteType(wasteType),
      this.commitmentsDuring(window),
    ]);
    return trucks.filter((t) => !busy.trucks.has(t.id));
  }

  /** Drivers free during `window`, most experienced first. */
  async availableDrivers(window: TimeWindow): Promise<DriverCandidate[]> {
    const [drivers, busy] = await Promise.all([
      this.store.listDrivers(),
      this.commitmentsDuring(window),
    ]);
    return drivers.filter((d) => !busy.drivers.has(d.employeeId));
  }

  /** Drivers with no trip at all on `date`, most experienced first. */
  async fullDayFreeDrivers(date: IsoDate): Promise<DriverCandidate[]> {
    const [drivers, trips] = await Promise.all([
      this.store.listDrivers(),
      this.store.listTripSlots(date, date),
    ]);
    const busy = new Set(trips.flatMap((t) => [t.driverHigh, t.driverLow]));
    return drivers.filter((d) => !busy.has(d.employeeId));
  }

  /** Whether the truck has any trip or maintenance on `date`. */
  async truckBusyOnDate(truckId: number, date: IsoDate): Promise<boolean> {
    const [trips, maintenance] = await Promise.all([
      this.store.listTripsOnDate({ truckId }, date),
      this.store.listMaintenanceOnDate(date),
    ]);
    return trips.length > 0 || maintenance.some((m) => m.truckId === truckId);
  }

  private async commitmentsDuring(window: TimeWindow): Promise<Commitments> {
    const date = toIsoDate(window.start);
    // Working-day trips can only reach a window from the neighbouring days.
    const [slots, maintenance] = await Promise.all([
      this.store.listTripSlots(addDays(date, -1), addDays(toIsoDate(window.end), 1)),
      this.store.listMaintenanceOnDate(date),
    ]);

    const trucks = new Set<number>(maintenance.map((m) => m.truckId));
    const drivers = new Set<number>();
    for (const slot of slots) {
      if (!tripBlocks(slot, window, this.policy)) continue;
      trucks.add(slot.truckId);
      drivers.add(slot.driverHigh);
      drivers.add(slot.driverLow);
    }
    return { trucks, drivers };
  }
}
