import type { IsoDate, Outcome, SchedulingStorePort } from '@waste-ops/domain';
import { SchedulingError, succeed, toFailure } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';

export interface RerouteResult {
  /** Facility the trips now unload at. */
  readonly facilityId: number;
  readonly rerouted: number;
}

/** Moves one day's trips off a facility onto the lowest-id alternate. */
export class WasteRerouteService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async rerouteWaste(facilityId: number, date: IsoDate): Promise<Outcome<RerouteResult>> {
    try {
      const result = await this.store.withTransaction(async (tx) => {
        const trips = await tx.listTripsOnDate({ facilityId }, date);
        if (trips.length === 0) throw new SchedulingError('NO_TRIPS');

        const original = await tx.findFacility(facilityId);
        const candidates = original ? await tx.listFacilitiesByWasteType(original.wasteType) : [];
        const alternate = candidates.find((f) => f.id !== facilityId);
        if (!alternate) throw new SchedulingError('NO_ALTERNATE_FACILITY');

        const rerouted = await tx.updateTripFacility(trips, alternate.id);
        return { facilityId: alternate.id, rerouted };
      });
      this.logger.info(
        `[waste-reroute] facility ${facilityId} on ${date}: ${result.rerouted} trip(s) ` +
          `moved to facility ${result.facilityId}`,
      );
      return succeed(result);
    } catch (err) {
      const outcome = toFailure<RerouteResult>(err);
      if (!outcome.ok) this.logger.warn(`[waste-reroute] facility ${facilityId} on ${date}: ${outcome.error}`);
      return outcome;
    }
  }
}
