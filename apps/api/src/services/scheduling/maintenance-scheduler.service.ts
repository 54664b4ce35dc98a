import type {
  IsoDate,
  MaintenanceRecord,
  Outcome,
  SchedulingPolicy,
  SchedulingStorePort,
  TruckWithWasteType,
} from '@waste-ops/domain';
import { DEFAULT_SCHEDULING_POLICY, addDays, fail, succeed, toFailure } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';
import { AvailabilityResolver } from './availability-resolver.js';

/**
 * Books the maintenance backlog: for each due truck, the first day after
 * `date` with a free qualified technician. Bookings are committed one truck
 * at a time; a truck that cannot be booked is skipped.
 */
export class MaintenanceSchedulerService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly policy: SchedulingPolicy = DEFAULT_SCHEDULING_POLICY,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async scheduleMaintenance(date: IsoDate): Promise<Outcome<MaintenanceRecord[]>> {
    try {
      const due = await this.store.listMaintenanceDue(date, this.policy);
      const booked: MaintenanceRecord[] = [];

      for (const truck of due) {
        try {
          const outcome = await this.book(truck, date);
          if (outcome.ok) booked.push(outcome.value);
          else {
            const reason = outcome.detail ? `${outcome.error} (${outcome.detail})` : outcome.error;
            this.logger.warn(`[maintenance-scheduler] truck ${truck.id}: ${reason}`);
          }
        } catch (err) {
          this.logger.error(`[maintenance-scheduler] truck ${truck.id} skipped`, err);
        }
      }

      this.logger.info(
        `[maintenance-scheduler] ${date}: ${booked.length} of ${due.length} due truck(s) booked`,
      );
      return succeed(booked);
    } catch (err) {
      const outcome = toFailure<MaintenanceRecord[]>(err);
      this.logger.error(`[maintenance-scheduler] ${date} failed`, err);
      return outcome;
    }
  }

  /** Books the first free day; NO_QUALIFIED_TECHNICIAN when none exists within the horizon. */
  private async book(truck: TruckWithWasteType, date: IsoDate): Promise<Outcome<MaintenanceRecord>> {
    const technicians = await this.store.listQualifiedTechnicians(truck.truckType);
    if (technicians.length === 0) return fail('NO_QUALIFIED_TECHNICIAN');

    const availability = new AvailabilityResolver(this.store, this.policy);
    for (let offset = 1; offset <= this.policy.maintenanceSearchHorizonDays; offset++) {
      const day = addDays(date, offset);
      if (
        this.policy.requireIdleTruckForMaintenance &&
        (await availability.truckBusyOnDate(truck.id, day))
      ) {
        continue;
      }

      const booked = new Set((await this.store.listMaintenanceOnDate(day)).map((m) => m.technicianId));
      const technician = technicians.find((t) => !booked.has(t.id));
      if (!technician) continue;

      const record: MaintenanceRecord = { truckId: truck.id, technicianId: technician.id, date: day };
      await this.store.insertMaintenance(record);
      return succeed(record);
    }

    return fail('NO_QUALIFIED_TECHNICIAN', `none free within ${this.policy.maintenanceSearchHorizonDays} days`);
  }
}
