export type WasteType = string;

export interface Route {
  readonly id: number;
  readonly wasteType: WasteType;
  readonly lengthKm: number;
}
