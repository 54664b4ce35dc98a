import type { IsoDate } from '../scheduling/calendar.js';

export interface MaintenanceRecord {
  readonly truckId: number;
  readonly technicianId: number;
  readonly date: IsoDate;
}
