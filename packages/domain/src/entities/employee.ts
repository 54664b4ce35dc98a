import type { IsoDate } from '../scheduling/calendar.js';
import type { TruckTypeCode } from './truck.js';

export interface Employee {
  readonly id: number;
  readonly name: string; // unique across the dataset
  readonly hireDate: IsoDate;
}

export interface Qualification {
  readonly employeeId: number;
  readonly truckType: TruckTypeCode;
}

/**
 * A driver as seen by the schedulers: one entry per employee holding at least
 * one driver qualification, with every truck type they may drive.
 */
export interface DriverCandidate {
  readonly employeeId: number;
  readonly hireDate: IsoDate;
  readonly truckTypes: ReadonlySet<TruckTypeCode>;
}
