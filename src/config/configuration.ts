/**
 * Application Configuration
 *
 * Loads the environment, validates it with the zod schema in
 * `validation.schema.ts` and maps it onto a typed `AppConfig`.
 *
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const taskApi = this.configService.get('taskApi', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';
import {
  BackoffStrategy,
  TaskPollerConfig,
  resolvePollerConfig,
} from '../application/poller-config';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  /**
   * Remote asynchronous-task service.
   *
   * `apiKey` is sent as `clientKey` in every request body and is never logged.
   */
  taskApi: {
    baseUrl: string;
    apiKey: string;
    requestTimeoutMs: number;
  };
  /**
   * Poll loop and submission retry policy.
   *
   * - `pollIntervalSeconds` (POLL_INTERVAL_SECONDS): pause between status queries
   * - `timeoutSeconds` (POLL_TIMEOUT_SECONDS): wall-clock budget of one poll loop
   * - `maxSubmitRetries` (MAX_SUBMIT_RETRIES): retries after the first failed submission
   * - `backoffBaseSeconds` / `backoffStrategy`: delay between submission attempts;
   *   exponential doubles the base on every retry
   */
  poller: {
    pollIntervalSeconds: number;
    timeoutSeconds: number;
    maxSubmitRetries: number;
    backoffBaseSeconds: number;
    backoffStrategy: BackoffStrategy;
  };
  output: {
    outcomePath?: string;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    taskApi: {
      baseUrl: env.TASK_API_BASE_URL,
      apiKey: env.TASK_API_KEY,
      requestTimeoutMs: env.TASK_API_REQUEST_TIMEOUT_MS,
    },
    poller: {
      pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
      timeoutSeconds: env.POLL_TIMEOUT_SECONDS,
      maxSubmitRetries: env.MAX_SUBMIT_RETRIES,
      backoffBaseSeconds: env.BACKOFF_BASE_SECONDS,
      backoffStrategy: env.BACKOFF_STRATEGY,
    },
    output: {
      outcomePath: env.OUTCOME_OUTPUT_PATH,
    },
  };
}

/**
 * Per-invocation poller configuration derived from the application config.
 */
export function toPollerConfig(config: AppConfig): TaskPollerConfig {
  return resolvePollerConfig({
    endpointBaseUrl: config.taskApi.baseUrl,
    authCredential: config.taskApi.apiKey,
    requestTimeoutMs: config.taskApi.requestTimeoutMs,
    ...config.poller,
  });
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
