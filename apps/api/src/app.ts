import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { createTripsRouter, createTrucksRouter, createFacilitiesRouter } from './controllers/trips.controller.js';
import { createDriversRouter } from './controllers/drivers.controller.js';
import { createMaintenanceRouter } from './controllers/maintenance.controller.js';
import { createTechniciansRouter } from './controllers/technicians.controller.js';
import { createErrorHandler } from './middleware/error-handler.js';
import type { SchedulingServices } from './services/scheduling/index.js';
import type { Logger } from './services/logger.js';

export interface AppOptions {
  services: SchedulingServices;
  corsOrigin?: string;
  /** morgan format for access logs; `false` disables them. */
  accessLog?: string | false;
  logger?: Logger;
}

export function buildApp(options: AppOptions): ReturnType<typeof express> {
  const { services } = options;
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  const accessLog = options.accessLog ?? 'combined';
  if (accessLog) app.use(morgan(accessLog));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.text({ type: 'text/plain', limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/trips', createTripsRouter(services));
  app.use('/api/trucks', createTrucksRouter(services));
  app.use('/api/facilities', createFacilitiesRouter(services));
  app.use('/api/maintenance', createMaintenanceRouter(services));
  app.use('/api/drivers', createDriversRouter(services));
  app.use('/api/technicians', createTechniciansRouter(services));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(createErrorHandler(options.logger));

  return app;
}
