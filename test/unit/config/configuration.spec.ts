import { describe, it, expect } from 'vitest';
import { validateEnv } from '../../../src/config/validation.schema';
import { buildAppConfig, toPollerConfig } from '../../../src/config/configuration';

describe('configuration', () => {
  const requiredEnv = {
    TASK_API_BASE_URL: 'https://api.task-service.test',
    TASK_API_KEY: 'test-secret',
  };

  describe('validateEnv', () => {
    it('fills in defaults', () => {
      expect(validateEnv(requiredEnv)).toEqual({
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        TASK_API_BASE_URL: 'https://api.task-service.test',
        TASK_API_KEY: 'test-secret',
        TASK_API_REQUEST_TIMEOUT_MS: 30000,
        POLL_INTERVAL_SECONDS: 2,
        POLL_TIMEOUT_SECONDS: 60,
        MAX_SUBMIT_RETRIES: 3,
        BACKOFF_BASE_SECONDS: 1,
        BACKOFF_STRATEGY: 'exponential',
        OUTCOME_OUTPUT_PATH: undefined,
      });
    });

    it('coerces numeric strings', () => {
      const env = validateEnv({
        ...requiredEnv,
        POLL_INTERVAL_SECONDS: '0.5',
        POLL_TIMEOUT_SECONDS: '90',
        MAX_SUBMIT_RETRIES: '0',
      });

      expect(env.POLL_INTERVAL_SECONDS).toBe(0.5);
      expect(env.POLL_TIMEOUT_SECONDS).toBe(90);
      expect(env.MAX_SUBMIT_RETRIES).toBe(0);
    });

    it('lists every missing variable', () => {
      expect(() => validateEnv({ TASK_API_KEY: 'test-secret' })).toThrow(
        'Environment validation failed:\n  - TASK_API_BASE_URL: Required',
      );
    });

    it('rejects a negative retry count', () => {
      expect(() => validateEnv({ ...requiredEnv, MAX_SUBMIT_RETRIES: '-1' })).toThrow(
        '  - MAX_SUBMIT_RETRIES: Number must be greater than or equal to 0',
      );
    });

    it('rejects an unknown backoff strategy', () => {
      expect(() => validateEnv({ ...requiredEnv, BACKOFF_STRATEGY: 'linear' })).toThrow(
        'BACKOFF_STRATEGY',
      );
    });
  });

  describe('toPollerConfig', () => {
    it('maps the application config onto a poller config', () => {
      const appConfig = buildAppConfig(
        validateEnv({
          ...requiredEnv,
          POLL_INTERVAL_SECONDS: '1',
          BACKOFF_STRATEGY: 'fixed',
          TASK_API_REQUEST_TIMEOUT_MS: '5000',
          OUTCOME_OUTPUT_PATH: 'out/outcome.json',
        }),
      );

      expect(appConfig.output.outcomePath).toBe('out/outcome.json');
      expect(toPollerConfig(appConfig)).toEqual({
        endpointBaseUrl: 'https://api.task-service.test',
        authCredential: 'test-secret',
        pollIntervalSeconds: 1,
        timeoutSeconds: 60,
        maxSubmitRetries: 3,
        backoffBaseSeconds: 1,
        backoffStrategy: 'fixed',
        requestTimeoutMs: 5000,
      });
    });
  });
});
