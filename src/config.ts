import { z } from 'zod';
import { ConfigError } from './errors.js';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Pool size; one query holds a single client for its whole snapshot
  PG_POOL_MAX: z.coerce.number().int().min(1).default(4),

  // 0 disables the per-statement timeout
  PG_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),

  REGION_QUERY_PARALLEL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type Config = z.infer<typeof EnvSchema>;

/** Validates environment variables. Throws ConfigError listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

export function requireDatabaseUrl(config: Config): string {
  if (config.DATABASE_URL === undefined) {
    throw new ConfigError(['DATABASE_URL: required to reach the point store']);
  }
  return config.DATABASE_URL;
}
