import type { IsoDate } from '../../scheduling/calendar.js';
import type { QualificationRecord } from '../../scheduling/qualifications.js';

/**
 * Public operation surface. No method rejects: failures come back as
 * `false`, `0` or an empty list.
 */
export interface WasteSchedulingPort {
  scheduleTrip(routeId: number, startTime: Date): Promise<boolean>;
  scheduleTrips(truckId: number, date: IsoDate): Promise<number>;
  updateTechnicians(records: readonly QualificationRecord[]): Promise<number>;
  workmateSphere(employeeId: number): Promise<number[]>;
  scheduleMaintenance(date: IsoDate): Promise<number>;
  rerouteWaste(facilityId: number, date: IsoDate): Promise<number>;
}
