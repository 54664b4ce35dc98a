/**
 * API Controller Tests
 *
 * Builds the Express app over real scheduling services backed by the
 * in-memory store, then drives the routes with supertest.
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { InMemorySchedulingStore } from '@waste-ops/adapters';
import { buildApp } from '../app.js';
import { createSchedulingServices, type SchedulingServices } from '../services/scheduling/index.js';
import { DAY, makeStore, makeTrip, at, silentLogger } from '../services/scheduling/__tests__/fixtures.js';

let store: InMemorySchedulingStore;
let services: SchedulingServices;
let app: ReturnType<typeof buildApp>;

function mount(seeded: InMemorySchedulingStore = makeStore()) {
  const logger = silentLogger();
  store = seeded;
  services = createSchedulingServices(store, { logger });
  app = buildApp({ services, accessLog: false, logger });
}

beforeEach(() => {
  mount();
});

// ─── Health ───────────────────────────────────────────────────────────────────

describe('GET /healthz', () => {
  it('returns ok', async () => {
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });
});

// ─── Trips ────────────────────────────────────────────────────────────────────

describe('POST /api/trips', () => {
  it('schedules a trip and returns it with a wall-clock start', async () => {
    const res = await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06T08:00' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      data: {
        routeId: 10,
        truckId: 2,
        startTime: '2024-05-06 08:00:00',
        volume: null,
        driverHigh: 2,
        driverLow: 1,
        facilityId: 1,
      },
    });
  });

  it('maps scheduling failures to status codes', async () => {
    const early = await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06 07:00' });
    expect(early.status).toBe(422);
    expect(early.body).toEqual({ error: 'WORKING_HOURS_VIOLATION' });

    const unknown = await request(app).post('/api/trips').send({ routeId: 99, startTime: '2024-05-06T09:00' });
    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: 'INVALID_ROUTE' });

    await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06T08:00' });
    const duplicate = await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06T13:00' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({ error: 'DUPLICATE_ROUTE_SAME_DAY' });
  });

  it('rejects a start time with an offset as a validation error', async () => {
    const res = await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06T08:00Z' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('returns 503 when the store fails', async () => {
    jest.spyOn(store, 'findRoute').mockRejectedValue(new Error('connection refused'));
    const res = await request(app).post('/api/trips').send({ routeId: 10, startTime: '2024-05-06T08:00' });
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: 'STORAGE_FAILURE' });
  });
});

describe('POST /api/trucks/:truckId/trips', () => {
  it('fills the truck day and reports the count', async () => {
    const res = await request(app).post('/api/trucks/2/trips').send({ date: DAY });

    expect(res.status).toBe(200);
    expect(res.body.scheduled).toBe(2);
    expect(res.body.data.map((t: { startTime: string }) => t.startTime)).toEqual([
      '2024-05-06 08:00:00',
      '2024-05-06 10:30:00',
    ]);
  });

  it('returns 404 for an unknown truck and 400 for a bad date', async () => {
    expect((await request(app).post('/api/trucks/99/trips').send({ date: DAY })).status).toBe(404);
    expect((await request(app).post('/api/trucks/2/trips').send({ date: '2024-02-30' })).status).toBe(400);
    expect((await request(app).post('/api/trucks/abc/trips').send({ date: DAY })).status).toBe(400);
  });
});

describe('POST /api/facilities/:facilityId/reroute', () => {
  it('reports the moved trips and their new facility', async () => {
    mount(makeStore({ trips: [makeTrip({ routeId: 10, startTime: at('08:00'), facilityId: 1 })] }));
    const res = await request(app).post('/api/facilities/1/reroute').send({ date: DAY });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ rerouted: 1, facilityId: 2 });
  });

  it('returns 409 when there is nothing to move', async () => {
    const res = await request(app).post('/api/facilities/1/reroute').send({ date: DAY });
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: 'NO_TRIPS' });
  });
});

// ─── Maintenance ──────────────────────────────────────────────────────────────

describe('POST /api/maintenance/schedule', () => {
  it('returns the booked records', async () => {
    mount(makeStore({ maintenance: [{ truckId: 1, technicianId: 5, date: '2024-01-10' }] }));
    const res = await request(app).post('/api/maintenance/schedule').send({ date: DAY });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      data: [{ truckId: 1, technicianId: 5, date: '2024-05-07' }],
      scheduled: 1,
    });
  });
});

// ─── Drivers ──────────────────────────────────────────────────────────────────

describe('GET /api/drivers/:driverId/workmates', () => {
  it('returns the workmate sphere', async () => {
    mount(makeStore({ trips: [makeTrip({ routeId: 10, startTime: at('08:00'), driverHigh: 4, driverLow: 1 })] }));
    const res = await request(app).get('/api/drivers/4/workmates');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ data: [1] });
  });

  it('returns 404 for a non-driver', async () => {
    const res = await request(app).get('/api/drivers/5/workmates');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'INVALID_DRIVER' });
  });
});

// ─── Technicians ──────────────────────────────────────────────────────────────

describe('POST /api/technicians/qualifications', () => {
  it('accepts a qualification file as plain text', async () => {
    const res = await request(app)
      .post('/api/technicians/qualifications')
      .set('Content-Type', 'text/plain')
      .send('Tech Gus Ek\nP1\nAda Moss\nP1\n');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      inserted: 1,
      rejected: [
        { record: { firstName: 'Ada', lastName: 'Moss', truckType: 'P1' }, reason: 'EMPLOYEE_IS_DRIVER' },
      ],
    });
  });

  it('accepts JSON records', async () => {
    const res = await request(app)
      .post('/api/technicians/qualifications')
      .send({ records: [{ firstName: 'Eli', lastName: 'Roth', truckType: 'G1' }] });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ inserted: 1, rejected: [] });
  });

  it('rejects a JSON body without records', async () => {
    const res = await request(app).post('/api/technicians/qualifications').send({});
    expect(res.status).toBe(400);
  });
});
