import { describe, it, expect } from '@jest/globals';
import { InMemorySchedulingStore } from '@waste-ops/adapters';
import type { Trip } from '@waste-ops/domain';
import { DEFAULT_SCHEDULING_POLICY } from '@waste-ops/domain';
import { TripSchedulerService } from '../trip-scheduler.service.js';
import { DAY, at, baseDataset, makeStore, silentLogger } from './fixtures.js';

function scheduler(store: InMemorySchedulingStore, logger = silentLogger()) {
  return new TripSchedulerService(store, DEFAULT_SCHEDULING_POLICY, logger);
}

describe('TripSchedulerService.scheduleTrip', () => {
  it('picks the largest free truck, the senior pair and the lowest facility', async () => {
    const store = makeStore();
    const outcome = await scheduler(store).scheduleTrip(10, at('08:00'));

    const expected: Trip = {
      routeId: 10,
      truckId: 2,
      startTime: at('08:00'),
      volume: null,
      driverHigh: 2,
      driverLow: 1,
      facilityId: 1,
    };
    expect(outcome).toEqual({ ok: true, value: expected });
    expect(store.snapshot().trips).toEqual([expected]);
  });

  describe('working hours', () => {
    it('rejects a start before the working day', async () => {
      const outcome = await scheduler(makeStore()).scheduleTrip(10, at('07:59'));
      expect(outcome).toEqual({ ok: false, error: 'WORKING_HOURS_VIOLATION' });
    });

    it('rejects a trip ending after the working day', async () => {
      // 20 km takes 4 h
      const store = makeStore();
      const outcome = await scheduler(store).scheduleTrip(12, at('12:30'));
      expect(outcome).toEqual({ ok: false, error: 'WORKING_HOURS_VIOLATION' });
      expect(store.snapshot().trips).toEqual([]);
    });

    it('accepts a trip ending exactly at the end of the day', async () => {
      const outcome = await scheduler(makeStore()).scheduleTrip(12, at('12:00'));
      expect(outcome.ok).toBe(true);
    });
  });

  it('rejects an invalid start time without touching the store', async () => {
    const store = makeStore();
    const logger = silentLogger();
    const outcome = await scheduler(store, logger).scheduleTrip(10, new Date(Number.NaN));

    expect(outcome).toEqual({ ok: false, error: 'WORKING_HOURS_VIOLATION' });
    expect(logger.warn).toHaveBeenCalledWith('[trip-scheduler] route 10: invalid start time');
    expect(store.snapshot().trips).toEqual([]);
  });

  it('breaks capacity and seniority ties by the lowest id', async () => {
    const store = makeStore({
      trucks: [
        { id: 5, truckType: 'P1', capacity: 10 },
        { id: 4, truckType: 'P1', capacity: 10 },
      ],
      employees: [
        { id: 3, name: 'Cy Park', hireDate: '2016-01-01' },
        { id: 2, name: 'Bo Lund', hireDate: '2016-01-01' },
        { id: 1, name: 'Ada Moss', hireDate: '2016-01-01' },
      ],
      drivers: [
        { employeeId: 3, truckType: 'P1' },
        { employeeId: 2, truckType: 'P1' },
        { employeeId: 1, truckType: 'P1' },
      ],
    });
    const outcome = await scheduler(store).scheduleTrip(10, at('08:00'));

    expect(outcome.ok && outcome.value).toMatchObject({ truckId: 4, driverHigh: 2, driverLow: 1 });
  });

  it('rejects an unknown route', async () => {
    const outcome = await scheduler(makeStore()).scheduleTrip(99, at('09:00'));
    expect(outcome).toEqual({ ok: false, error: 'INVALID_ROUTE' });
  });

  it('rejects a second trip for a route on the same day only', async () => {
    const store = makeStore();
    const service = scheduler(store);
    await service.scheduleTrip(10, at('08:00'));

    await expect(service.scheduleTrip(10, at('13:00'))).resolves.toEqual({
      ok: false,
      error: 'DUPLICATE_ROUTE_SAME_DAY',
    });
    const nextDay = await service.scheduleTrip(10, at('08:00', '2024-05-07'));
    expect(nextDay.ok).toBe(true);
  });

  describe('no overlap', () => {
    it('keeps the 30 minute buffer around the trucks and drivers of other trips', async () => {
      const store = makeStore();
      const service = scheduler(store);
      await service.scheduleTrip(10, at('08:00')); // truck 2, drivers 1+2, busy until 10:30

      const overlapping = await service.scheduleTrip(11, at('10:00'));
      expect(overlapping.ok && overlapping.value).toMatchObject({ truckId: 1, driverHigh: 4, driverLow: 3 });
    });

    it('a trip starting exactly one buffer later can reuse truck and drivers', async () => {
      const store = makeStore();
      const service = scheduler(store);
      await service.scheduleTrip(10, at('08:00'));

      const touching = await service.scheduleTrip(11, at('10:30'));
      expect(touching.ok && touching.value).toMatchObject({ truckId: 2, driverHigh: 2, driverLow: 1 });
    });

    it('fails with NO_AVAILABLE_TRUCK once every truck of the waste type is busy', async () => {
      const store = makeStore();
      const service = scheduler(store);
      await service.scheduleTrip(10, at('08:00'));
      await service.scheduleTrip(11, at('08:00'));

      await expect(service.scheduleTrip(12, at('09:00'))).resolves.toEqual({
        ok: false,
        error: 'NO_AVAILABLE_TRUCK',
      });
      expect(store.snapshot().trips).toHaveLength(2);
    });

    it('a truck in maintenance that day is not available', async () => {
      const store = makeStore({
        maintenance: [
          { truckId: 1, technicianId: 5, date: DAY },
          { truckId: 2, technicianId: 6, date: DAY },
        ],
      });
      await expect(scheduler(store).scheduleTrip(10, at('08:00'))).resolves.toEqual({
        ok: false,
        error: 'NO_AVAILABLE_TRUCK',
      });
    });
  });

  it('fails with NO_AVAILABLE_DRIVER when no qualified pair is free', async () => {
    const store = makeStore({
      drivers: [
        { employeeId: 1, truckType: 'P1' },
        { employeeId: 2, truckType: 'P1' },
      ],
    });
    const service = scheduler(store);
    await service.scheduleTrip(10, at('08:00'));

    await expect(service.scheduleTrip(11, at('09:00'))).resolves.toEqual({
      ok: false,
      error: 'NO_AVAILABLE_DRIVER',
    });
  });

  it('fails with NO_FACILITY when nothing accepts the waste type', async () => {
    const facilities = baseDataset().facilities.filter((f) => f.wasteType !== 'glass');
    const outcome = await scheduler(makeStore({ facilities })).scheduleTrip(20, at('08:00'));
    expect(outcome).toEqual({ ok: false, error: 'NO_FACILITY' });
  });

  it('gives the same answer for a repeated failing request and writes nothing', async () => {
    const store = makeStore();
    const service = scheduler(store);
    const first = await service.scheduleTrip(12, at('15:00'));
    const second = await service.scheduleTrip(12, at('15:00'));
    expect(second).toEqual(first);
    expect(store.snapshot().trips).toEqual([]);
  });

  it('rolls back and reports STORAGE_FAILURE when the insert fails', async () => {
    class FailingInsertStore extends InMemorySchedulingStore {
      override async insertTrip(): Promise<void> {
        throw new Error('disk full');
      }
    }
    const store = new FailingInsertStore(baseDataset());
    const logger = silentLogger();

    const outcome = await scheduler(store, logger).scheduleTrip(10, at('08:00'));
    expect(outcome).toEqual({ ok: false, error: 'STORAGE_FAILURE', detail: 'disk full' });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(store.snapshot().trips).toEqual([]);
  });
});
