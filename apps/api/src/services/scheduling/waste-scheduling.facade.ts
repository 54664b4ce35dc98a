import type {
  IsoDate,
  Outcome,
  QualificationRecord,
  WasteSchedulingPort,
} from '@waste-ops/domain';
import { fail } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';
import type { SchedulingServices } from './index.js';

/**
 * Plain-value surface over the scheduling services: booleans, counts and id
 * lists, with every failure collapsed to `false`, `0` or `[]`.
 */
export class WasteSchedulingFacade implements WasteSchedulingPort {
  constructor(
    private readonly services: SchedulingServices,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async scheduleTrip(routeId: number, startTime: Date): Promise<boolean> {
    const outcome = await this.settle('scheduleTrip', () =>
      this.services.trips.scheduleTrip(routeId, startTime),
    );
    return outcome.ok;
  }

  async scheduleTrips(truckId: number, date: IsoDate): Promise<number> {
    const outcome = await this.settle('scheduleTrips', () =>
      this.services.batches.scheduleTrips(truckId, date),
    );
    return outcome.ok ? outcome.value.length : 0;
  }

  async updateTechnicians(records: readonly QualificationRecord[]): Promise<number> {
    const outcome = await this.settle('updateTechnicians', () =>
      this.services.qualifications.updateTechnicians(records),
    );
    return outcome.ok ? outcome.value.inserted.length : 0;
  }

  async workmateSphere(employeeId: number): Promise<number[]> {
    const outcome = await this.settle('workmateSphere', () =>
      this.services.workmates.workmateSphere(employeeId),
    );
    return outcome.ok ? outcome.value : [];
  }

  async scheduleMaintenance(date: IsoDate): Promise<number> {
    const outcome = await this.settle('scheduleMaintenance', () =>
      this.services.maintenance.scheduleMaintenance(date),
    );
    return outcome.ok ? outcome.value.length : 0;
  }

  async rerouteWaste(facilityId: number, date: IsoDate): Promise<number> {
    const outcome = await this.settle('rerouteWaste', () =>
      this.services.reroute.rerouteWaste(facilityId, date),
    );
    return outcome.ok ? outcome.value.rerouted : 0;
  }

  // Services already return outcomes; this only catches programming errors.
  private async settle<T>(operation: string, run: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
    try {
      return await run();
    } catch (err) {
      this.logger.error(`[waste-scheduling] ${operation} threw`, err);
      return fail('STORAGE_FAILURE');
    }
  }
}
