import type { Outcome, SchedulingPolicy, SchedulingStorePort, Trip } from '@waste-ops/domain';
import {
  DEFAULT_SCHEDULING_POLICY,
  SchedulingError,
  atWallClock,
  fail,
  formatWallClock,
  orderedPair,
  pickDriverPair,
  succeed,
  toFailure,
  toIsoDate,
  tripWindow,
} from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';
import { AvailabilityResolver } from './availability-resolver.js';

/**
 * Schedules a single route at a given time. All-or-nothing: every check and
 * the insert share one transaction, and any failed check rolls it back.
 */
export class TripSchedulerService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly policy: SchedulingPolicy = DEFAULT_SCHEDULING_POLICY,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async scheduleTrip(routeId: number, startTime: Date): Promise<Outcome<Trip>> {
    if (Number.isNaN(startTime.getTime())) {
      this.logger.warn(`[trip-scheduler] route ${routeId}: invalid start time`);
      return fail('WORKING_HOURS_VIOLATION');
    }
    const at = formatWallClock(startTime);
    try {
      const trip = await this.store.withTransaction((tx) => this.plan(tx, routeId, startTime));
      this.logger.info(
        `[trip-scheduler] route ${routeId} at ${at}: truck ${trip.truckId}, ` +
          `drivers ${trip.driverHigh}/${trip.driverLow}, facility ${trip.facilityId}`,
      );
      return succeed(trip);
    } catch (err) {
      const outcome = toFailure<Trip>(err);
      if (!outcome.ok && outcome.error === 'STORAGE_FAILURE') {
        this.logger.error(`[trip-scheduler] route ${routeId} at ${at} failed`, err);
      } else if (!outcome.ok) {
        this.logger.warn(`[trip-scheduler] route ${routeId} at ${at} not scheduled: ${outcome.error}`);
      }
      return outcome;
    }
  }

  private async plan(tx: SchedulingStorePort, routeId: number, startTime: Date): Promise<Trip> {
    const route = await tx.findRoute(routeId);
    if (!route) throw new SchedulingError('INVALID_ROUTE', `route ${routeId}`);

    const window = tripWindow(startTime, route.lengthKm, this.policy);
    const date = toIsoDate(startTime);
    const dayStart = atWallClock(date, this.policy.workdayStartHour).getTime();
    const dayEnd = atWallClock(date, this.policy.workdayEndHour).getTime();
    const start = window.start.getTime();
    if (start < dayStart || start > dayEnd || window.end.getTime() > dayEnd) {
      throw new SchedulingError('WORKING_HOURS_VIOLATION');
    }

    const sameDay = await tx.listTripsOnDate({ routeId }, date);
    if (sameDay.length > 0) throw new SchedulingError('DUPLICATE_ROUTE_SAME_DAY');

    const [facility] = await tx.listFacilitiesByWasteType(route.wasteType);
    if (!facility) throw new SchedulingError('NO_FACILITY');

    const availability = new AvailabilityResolver(tx, this.policy);
    const [truck] = await availability.availableTrucks(window, route.wasteType);
    if (!truck) throw new SchedulingError('NO_AVAILABLE_TRUCK');

    const pair = pickDriverPair(await availability.availableDrivers(window), truck.truckType);
    if (!pair) throw new SchedulingError('NO_AVAILABLE_DRIVER');

    const trip: Trip = {
      routeId,
      truckId: truck.id,
      startTime,
      volume: null,
      ...orderedPair(pair),
      facilityId: facility.id,
    };
    await tx.insertTrip(trip);
    return trip;
  }
}
