import { z } from 'zod';
import type { CircuitJobsConfig } from './types';
import { ConfigError } from './errors';

export const DEFAULTS: CircuitJobsConfig = {
  host: 'localhost',
  port: 443,
  useSsl: true,
  timeoutMs: 30_000,
  pollIntervalMs: 1000,
  logLevel: 'info'
};

export function mergeConfig(cfg: Partial<CircuitJobsConfig>): CircuitJobsConfig {
  const defined = Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined));
  return Object.assign({}, DEFAULTS, defined);
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (['1', 'true', 'yes'].includes(value)) return true;
    if (['0', 'false', 'no'].includes(value)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a boolean flag' });
    return z.NEVER;
  });

const envSchema = z.object({
  CIRCUIT_JOBS_TOKEN: z.string().min(1).optional(),
  CIRCUIT_JOBS_HOST: z.string().min(1).optional(),
  CIRCUIT_JOBS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  CIRCUIT_JOBS_USE_SSL: booleanFlag.optional(),
  CIRCUIT_JOBS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  CIRCUIT_JOBS_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().optional(),
  CIRCUIT_JOBS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
});

/**
 * Read configuration from environment variables, falling back to DEFAULTS.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): CircuitJobsConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  const vars = parsed.data;
  return mergeConfig({
    token: vars.CIRCUIT_JOBS_TOKEN,
    host: vars.CIRCUIT_JOBS_HOST,
    port: vars.CIRCUIT_JOBS_PORT,
    useSsl: vars.CIRCUIT_JOBS_USE_SSL,
    timeoutMs: vars.CIRCUIT_JOBS_TIMEOUT_MS,
    pollIntervalMs: vars.CIRCUIT_JOBS_POLL_INTERVAL_MS,
    logLevel: vars.CIRCUIT_JOBS_LOG_LEVEL
  });
}
