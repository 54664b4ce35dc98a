import type { Outcome, SchedulingStorePort } from '@waste-ops/domain';
import { buildAdjacency, fail, reachableFrom, succeed, toFailure } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';

/** Everyone linked to a driver through any chain of shared trips. */
export class WorkmateSphereService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async workmateSphere(employeeId: number): Promise<Outcome<number[]>> {
    try {
      if (!(await this.store.isDriver(employeeId))) return fail('INVALID_DRIVER');
      const adjacency = buildAdjacency(await this.store.listTripPairs());
      return succeed(reachableFrom(adjacency, employeeId));
    } catch (err) {
      this.logger.error(`[workmate-sphere] employee ${employeeId} failed`, err);
      return toFailure(err);
    }
  }
}
