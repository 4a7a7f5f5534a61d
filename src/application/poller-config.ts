import { z } from 'zod';
import { formatIssues } from '../config/validation.schema';
import { TaskServiceEndpoint } from './ports/output/task-service.port';

export type BackoffStrategy = 'fixed' | 'exponential';

export const DEFAULT_POLL_INTERVAL_SECONDS = 2;
export const DEFAULT_TIMEOUT_SECONDS = 60;
export const DEFAULT_MAX_SUBMIT_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_SECONDS = 1;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const pollerConfigSchema = z.object({
  endpointBaseUrl: z.string().url(),
  authCredential: z.string().min(1),
  pollIntervalSeconds: z.number().positive().default(DEFAULT_POLL_INTERVAL_SECONDS),
  timeoutSeconds: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  maxSubmitRetries: z.number().int().min(0).default(DEFAULT_MAX_SUBMIT_RETRIES),
  backoffBaseSeconds: z.number().min(0).default(DEFAULT_BACKOFF_BASE_SECONDS),
  backoffStrategy: z.enum(['fixed', 'exponential']).default('exponential'),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

/**
 * Everything one poller invocation needs. Passed explicitly into every call;
 * nothing is read from process-wide state.
 */
export type TaskPollerConfig = z.output<typeof pollerConfigSchema>;
export type TaskPollerConfigInput = z.input<typeof pollerConfigSchema>;

/**
 * Validate a partial configuration and fill in the defaults.
 */
export function resolvePollerConfig(input: TaskPollerConfigInput): TaskPollerConfig {
  const result = pollerConfigSchema.safeParse(input);

  if (!result.success) {
    throw new Error(`Invalid poller configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

/**
 * Delay before retry number `retry` (1-based).
 */
export function backoffDelayMs(config: TaskPollerConfig, retry: number): number {
  const baseMs = config.backoffBaseSeconds * 1000;
  if (config.backoffStrategy === 'fixed') {
    return baseMs;
  }
  return baseMs * Math.pow(2, retry - 1);
}

/**
 * Endpoint details for the task service port.
 */
export function toEndpoint(config: TaskPollerConfig): TaskServiceEndpoint {
  return {
    baseUrl: config.endpointBaseUrl,
    credential: config.authCredential,
    requestTimeoutMs: config.requestTimeoutMs,
  };
}
