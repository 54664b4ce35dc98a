// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/route.js';
export * from './entities/truck.js';
export * from './entities/employee.js';
export * from './entities/facility.js';
export * from './entities/trip.js';
export * from './entities/maintenance.js';

// ─── Scheduling rules ─────────────────────────────────────────────────────────
export * from './scheduling/calendar.js';
export * from './scheduling/policy.js';
export * from './scheduling/interval.js';
export * from './scheduling/outcome.js';
export * from './scheduling/driver-pairing.js';
export * from './scheduling/batch-packing.js';
export * from './scheduling/maintenance-backlog.js';
export * from './scheduling/workmate-graph.js';
export * from './scheduling/qualifications.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/waste-scheduling.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/scheduling-store.port.js';
