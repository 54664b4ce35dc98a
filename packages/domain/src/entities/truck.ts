import type { WasteType } from './route.js';

export type TruckTypeCode = string;

export interface TruckType {
  readonly code: TruckTypeCode;
  readonly wasteType: WasteType;
}

export interface Truck {
  readonly id: number;
  readonly truckType: TruckTypeCode;
  readonly capacity: number;
}

/** Truck read together with the waste type its truck type carries */
export interface TruckWithWasteType extends Truck {
  readonly wasteType: WasteType;
}
