import type { WasteType } from './route.js';

export interface Facility {
  readonly id: number;
  readonly wasteType: WasteType;
  readonly address?: string;
}
