import { DateTime } from 'luxon';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const tenantIdList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  )
  .pipe(z.array(z.string().uuid()));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  API_PORT: z.coerce.number().int().positive().default(3000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  JWT_SECRET: z.string().min(8),
  DATABASE_URL_API: z.string().min(1),
  DATABASE_URL_WORKER: z.string().min(1),
  REDIS_URL: z.string().min(1),
  DISABLE_QUEUE: booleanFlag,
  BUSINESS_TIMEZONE: z
    .string()
    .default('UTC')
    .refine((zone) => DateTime.local().setZone(zone).isValid, { message: 'must be an IANA time zone' }),
  WORK_ORDER_NUMBER_PREFIX: z
    .string()
    .regex(/^[A-Z][A-Z0-9]{0,9}$/, 'must be 1-10 uppercase letters or digits')
    .default('WO'),
  AUTO_SCHEDULE_TENANT_IDS: tenantIdList,
  AUTO_SCHEDULE_INTERVAL_MINUTES: z.coerce.number().int().positive().default(15)
});

export type AppEnv = z.infer<typeof EnvSchema>;

// Migrations run as the schema owner, outside the RLS roles the api and worker use.
export const MigrationEnvSchema = EnvSchema.pick({ NODE_ENV: true, LOG_LEVEL: true }).extend({
  DATABASE_URL_ROOT: z.string().min(1)
});

export type MigrationEnv = z.infer<typeof MigrationEnvSchema>;

export const loadEnv = (input: Record<string, string | undefined> = process.env): AppEnv => {
  return EnvSchema.parse(input);
};

export const loadMigrationEnv = (input: Record<string, string | undefined> = process.env): MigrationEnv => {
  return MigrationEnvSchema.parse(input);
};
