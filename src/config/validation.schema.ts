import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Task API
  TASK_API_BASE_URL: z.string().url(),
  TASK_API_KEY: z.string().min(1),
  TASK_API_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Poller
  POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(2),
  POLL_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  MAX_SUBMIT_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  BACKOFF_BASE_SECONDS: z.coerce.number().min(0).default(1),
  BACKOFF_STRATEGY: z.enum(['fixed', 'exponential']).default('exponential'),

  // Output
  OUTCOME_OUTPUT_PATH: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    throw new Error(`Environment validation failed:\n${formatIssues(result.error)}`);
  }

  return result.data;
}
