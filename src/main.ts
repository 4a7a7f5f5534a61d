#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AppModule } from './app.module';
import { AppConfig, toPollerConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { RunTaskUseCase } from './application/use-cases/run-task.use-case';
import { OUTCOME_STORE_PORT, OutcomeRecord, OutcomeStorePort } from './application/ports/output';
import { RunTaskResult } from './application/ports/input';
import { describeOutcome, isReady } from './domain';
import { CliUsageError, loadTaskRequest, parseCliArgs } from './cli/cli-args';
import { registerCrashHandlers } from './cli/crash-handlers';

/**
 * Submit one task, poll it to a terminal outcome and report it.
 * Exit code 0 when the task is ready, 1 otherwise, 2 on bad invocation.
 */
async function bootstrap(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const request = await loadTaskRequest(args.requestPath);

  // Create NestJS application context (no HTTP server)
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const correlationId = uuidv4();
  const runLogger = app.get(PinoLoggerService).withCorrelationId(correlationId);
  app.useLogger(runLogger);

  const logger = runLogger.forContext('Bootstrap');
  registerCrashHandlers(logger);

  const appConfig: AppConfig = {
    nodeEnv: configService.getOrThrow('nodeEnv', { infer: true }),
    logLevel: configService.getOrThrow('logLevel', { infer: true }),
    taskApi: configService.getOrThrow('taskApi', { infer: true }),
    poller: configService.getOrThrow('poller', { infer: true }),
    output: configService.getOrThrow('output', { infer: true }),
  };
  const config = toPollerConfig(appConfig);

  const controller = new AbortController();
  const cancel = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, cancelling task polling');
    controller.abort();
  };
  process.once('SIGTERM', () => cancel('SIGTERM'));
  process.once('SIGINT', () => cancel('SIGINT'));

  logger.info(
    {
      endpoint: config.endpointBaseUrl,
      pollIntervalSeconds: config.pollIntervalSeconds,
      timeoutSeconds: config.timeoutSeconds,
      maxSubmitRetries: config.maxSubmitRetries,
    },
    'Running task',
  );

  let result: RunTaskResult;
  try {
    result = await app.get(RunTaskUseCase).execute({
      request,
      config,
      signal: controller.signal,
    });

    const outputPath = args.outputPath ?? appConfig.output.outcomePath;
    if (outputPath) {
      const record: OutcomeRecord = {
        correlationId,
        finishedAt: new Date().toISOString(),
        ...(result.submitted
          ? { handle: result.handle, outcome: result.outcome }
          : { submissionError: result.submissionError.toJSON() }),
      };
      await app.get<OutcomeStorePort>(OUTCOME_STORE_PORT).save(record, outputPath);
    }
  } finally {
    await app.close();
  }

  if (!result.submitted) {
    logger.error({ kind: result.submissionError.kind }, result.submissionError.message);
    return 1;
  }

  const { outcome } = result;
  if (isReady(outcome)) {
    logger.info({ handle: outcome.handle, polls: outcome.polls }, describeOutcome(outcome));
    process.stdout.write(`${JSON.stringify(outcome.result)}\n`);
    return 0;
  }

  logger.error({ handle: outcome.handle, kind: outcome.kind }, describeOutcome(outcome));
  return 1;
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }
    console.error('Task run failed:', error);
    process.exitCode = 1;
  });
