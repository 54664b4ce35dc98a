import 'dotenv/config';
import { createServer } from 'http';
import {
  PgSchedulingStore,
  applySchema,
  closePool,
  createPool,
  poolExecutor,
} from '@waste-ops/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createSchedulingServices } from './services/scheduling/index.js';

async function main() {
  const config = loadConfig();
  const pool = createPool({ connectionString: config.databaseUrl });

  // Verify DB connection
  await pool.query('SELECT 1');
  console.log('[server] database connected');

  if (config.applySchema) {
    await applySchema(poolExecutor(pool));
    console.log('[server] schema applied');
  }

  const services = createSchedulingServices(PgSchedulingStore.fromPool(pool), {
    policy: config.policy,
  });
  const app = buildApp({ services, corsOrigin: config.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool(pool);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
