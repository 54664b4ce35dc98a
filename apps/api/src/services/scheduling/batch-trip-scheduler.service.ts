import type { IsoDate, Outcome, SchedulingPolicy, SchedulingStorePort, Trip } from '@waste-ops/domain';
import {
  DEFAULT_SCHEDULING_POLICY,
  fail,
  orderedPair,
  packRoutes,
  pickDriverPair,
  succeed,
  toFailure,
} from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';
import { AvailabilityResolver } from './availability-resolver.js';

/**
 * Fills one truck's day with its unscheduled routes, reusing one driver pair
 * and one facility. Each trip is committed as it is placed, so a batch that
 * stops early keeps what it already scheduled.
 */
export class BatchTripSchedulerService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly policy: SchedulingPolicy = DEFAULT_SCHEDULING_POLICY,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async scheduleTrips(truckId: number, date: IsoDate): Promise<Outcome<Trip[]>> {
    try {
      const truck = await this.store.findTruck(truckId);
      if (!truck) return this.reject(truckId, date, fail('INVALID_TRUCK'));

      const availability = new AvailabilityResolver(this.store, this.policy);
      if (await availability.truckBusyOnDate(truck.id, date)) {
        return this.reject(truckId, date, fail('NO_AVAILABLE_TRUCK'));
      }

      const [routes, tripsOnDate] = await Promise.all([
        this.store.listRoutesByWasteType(truck.wasteType),
        this.store.listTripSlots(date, date),
      ]);
      const taken = new Set(tripsOnDate.map((t) => t.routeId));
      const candidates = routes.filter((r) => !taken.has(r.id));
      if (candidates.length === 0) return this.reject(truckId, date, fail('NO_ROUTES'));

      const pair = pickDriverPair(await availability.fullDayFreeDrivers(date), truck.truckType);
      if (!pair) return this.reject(truckId, date, fail('NO_AVAILABLE_DRIVER'));

      const [facility] = await this.store.listFacilitiesByWasteType(truck.wasteType);
      if (!facility) return this.reject(truckId, date, fail('NO_FACILITY'));

      const drivers = orderedPair(pair);
      const scheduled: Trip[] = [];
      for (const { route, window } of packRoutes(candidates, date, this.policy)) {
        const trip: Trip = {
          routeId: route.id,
          truckId: truck.id,
          startTime: window.start,
          volume: null,
          ...drivers,
          facilityId: facility.id,
        };
        try {
          await this.store.insertTrip(trip);
        } catch (err) {
          this.logger.error(`[batch-scheduler] truck ${truckId} stopped at route ${route.id}`, err);
          break;
        }
        scheduled.push(trip);
      }

      this.logger.info(`[batch-scheduler] truck ${truckId} on ${date}: ${scheduled.length} trip(s)`);
      return succeed(scheduled);
    } catch (err) {
      return this.reject(truckId, date, toFailure(err));
    }
  }

  private reject(truckId: number, date: IsoDate, outcome: Outcome<Trip[]>): Outcome<Trip[]> {
    if (!outcome.ok) {
      this.logger.warn(`[batch-scheduler] truck ${truckId} on ${date}: ${outcome.error}`);
    }
    return outcome;
  }
}
