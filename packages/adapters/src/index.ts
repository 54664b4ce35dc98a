// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  createPool,
  closePool,
  poolExecutor,
  withTransaction,
  applySchema,
  DEFAULT_SCHEMA_PATH,
} from './postgres/pool.js';
export type {
  DbPool,
  PoolOptions,
  SqlClient,
  SqlExecutor,
  TransactionalSqlExecutor,
} from './postgres/pool.js';
export { PgSchedulingStore } from './postgres/scheduling.store.js';

// ─── In-memory Adapter ────────────────────────────────────────────────────────
export { InMemorySchedulingStore } from './memory/in-memory-scheduling.store.js';
export type { SchedulingDataset } from './memory/in-memory-scheduling.store.js';
