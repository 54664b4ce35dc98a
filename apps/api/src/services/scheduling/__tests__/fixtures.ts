import { jest } from '@jest/globals';
import type { Trip } from '@waste-ops/domain';
import { InMemorySchedulingStore, type SchedulingDataset } from '@waste-ops/adapters';

export const DAY = '2024-05-06';

export function at(hhmm: string, date = DAY): Date {
  return new Date(`${date}T${hhmm}:00Z`);
}

export function silentLogger() {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

/**
 * Paper trucks 1 (P1, 10) and 2 (P1, 14), glass truck 3 (G1).
 * Drivers 1-4 in seniority order; 3 only drives P2. Technicians 5 (P1) and
 * 6 (P1, G1); 7 has no role.
 */
export function baseDataset(): SchedulingDataset {
  return {
    truckTypes: [
      { code: 'P1', wasteType: 'paper' },
      { code: 'P2', wasteType: 'paper' },
      { code: 'G1', wasteType: 'glass' },
    ],
    trucks: [
      { id: 1, truckType: 'P1', capacity: 10 },
      { id: 2, truckType: 'P1', capacity: 14 },
      { id: 3, truckType: 'G1', capacity: 8 },
    ],
    employees: [
      { id: 1, name: 'Ada Moss', hireDate: '2015-01-01' },
      { id: 2, name: 'Bo Lund', hireDate: '2016-01-01' },
      { id: 3, name: 'Cy Park', hireDate: '2017-01-01' },
      { id: 4, name: 'Di Vik', hireDate: '2018-01-01' },
      { id: 5, name: 'Eli Roth', hireDate: '2019-01-01' },
      { id: 6, name: 'Fay Dahl', hireDate: '2020-01-01' },
      { id: 7, name: 'Gus Ek', hireDate: '2021-01-01' },
    ],
    drivers: [
      { employeeId: 1, truckType: 'P1' },
      { employeeId: 2, truckType: 'P1' },
      { employeeId: 2, truckType: 'G1' },
      { employeeId: 3, truckType: 'P2' },
      { employeeId: 4, truckType: 'P1' },
    ],
    technicians: [
      { employeeId: 5, truckType: 'P1' },
      { employeeId: 6, truckType: 'P1' },
      { employeeId: 6, truckType: 'G1' },
    ],
    facilities: [
      { id: 1, wasteType: 'paper', address: 'Quay 1' },
      { id: 2, wasteType: 'paper' },
      { id: 3, wasteType: 'glass' },
    ],
    routes: [
      { id: 10, wasteType: 'paper', lengthKm: 10 },
      { id: 11, wasteType: 'paper', lengthKm: 5 },
      { id: 12, wasteType: 'paper', lengthKm: 20 },
      { id: 20, wasteType: 'glass', lengthKm: 10 },
    ],
    trips: [],
    maintenance: [],
  };
}

export function makeStore(overrides: Partial<SchedulingDataset> = {}): InMemorySchedulingStore {
  return new InMemorySchedulingStore({ ...baseDataset(), ...overrides });
}

export function makeTrip(overrides: Partial<Trip> & Pick<Trip, 'routeId' | 'startTime'>): Trip {
  return {
    truckId: 1,
    volume: null,
    driverHigh: 2,
    driverLow: 1,
    facilityId: 1,
    ...overrides,
  };
}
