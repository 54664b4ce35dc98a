import { z } from 'zod';
import type { SchedulingPolicy } from '@waste-ops/domain';
import { DEFAULT_SCHEDULING_POLICY } from '@waste-ops/domain';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  DB_APPLY_SCHEMA: booleanFlag.default('false'),
  MAINTENANCE_SEARCH_HORIZON_DAYS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SCHEDULING_POLICY.maintenanceSearchHorizonDays),
  MAINTENANCE_REQUIRE_IDLE_TRUCK: booleanFlag.default('true'),
});

export interface ApiConfig {
  databaseUrl: string;
  port: number;
  corsOrigin: string;
  applySchema: boolean;
  policy: SchedulingPolicy;
}

/** Read and validate the process environment; throws a ZodError when invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.parse(env);
  return {
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    applySchema: parsed.DB_APPLY_SCHEMA,
    policy: {
      ...DEFAULT_SCHEDULING_POLICY,
      maintenanceSearchHorizonDays: parsed.MAINTENANCE_SEARCH_HORIZON_DAYS,
      requireIdleTruckForMaintenance: parsed.MAINTENANCE_REQUIRE_IDLE_TRUCK,
    },
  };
}
