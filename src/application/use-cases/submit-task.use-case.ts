import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SubmitTaskCommand,
  SubmitTaskPort,
  SubmitTaskResult,
} from '../ports/input/submit-task.port';
import { TASK_SERVICE_PORT, TaskCreated, TaskServicePort } from '../ports/output/task-service.port';
import { CLOCK_PORT, ClockPort } from '../ports/output/clock.port';
import { EVENT_PUBLISHER_PORT, EventPublisherPort } from '../ports/output/event-publisher.port';
import { backoffDelayMs, toEndpoint } from '../poller-config';
import { SubmissionError } from '../../domain/errors/submission.error';
import {
  TaskApiMalformedResponseError,
  TaskApiRejectionError,
  TaskApiTransportError,
} from '../../domain/errors/task-api.errors';
import { TaskSubmittedEvent } from '../../domain/events/task-submitted.event';

/**
 * Submit Task Use Case
 * Creates a task on the remote service. Transport failures are retried with
 * backoff up to `maxSubmitRetries` times; rejections and malformed replies
 * are not retried.
 */
@Injectable()
export class SubmitTaskUseCase implements SubmitTaskPort {
  private readonly logger = new Logger(SubmitTaskUseCase.name);

  constructor(
    @Inject(TASK_SERVICE_PORT) private readonly taskService: TaskServicePort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: SubmitTaskCommand): Promise<SubmitTaskResult> {
    const { request, config, signal } = command;
    const endpoint = toEndpoint(config);
    const maxAttempts = config.maxSubmitRetries + 1;

    let lastError: TaskApiTransportError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new SubmissionError('Task submission was cancelled', {
          kind: 'Cancelled',
          attempts: attempt - 1,
          cause: lastError,
        });
      }

      let created: TaskCreated;
      try {
        created = await this.taskService.createTask(request, endpoint);
      } catch (error) {
        lastError = this.classify(error, attempt);

        this.logger.warn(
          `Task submission attempt ${attempt}/${maxAttempts} failed: ${lastError.message}`,
        );

        if (attempt < maxAttempts) {
          await this.clock.sleep(backoffDelayMs(config, attempt), signal);
        }
        continue;
      }

      const handle = created.handle.trim();
      if (handle.length === 0) {
        throw new SubmissionError('Task service returned an empty task handle', {
          kind: 'MalformedResponse',
          attempts: attempt,
        });
      }

      this.logger.log(`Task ${handle} submitted after ${attempt} attempt(s)`);
      await this.eventPublisher.publish(new TaskSubmittedEvent({ handle, attempts: attempt }));

      return { handle, attempts: attempt };
    }

    if (config.maxSubmitRetries === 0) {
      throw new SubmissionError(`Task submission failed: ${lastError?.message ?? 'unknown error'}`, {
        kind: 'TransportFailure',
        attempts: maxAttempts,
        cause: lastError,
      });
    }

    throw new SubmissionError(
      `Task submission failed after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      {
        kind: 'RetriesExhausted',
        attempts: maxAttempts,
        cause: lastError,
      },
    );
  }

  /**
   * Returns the error when it is worth another attempt, throws otherwise.
   */
  private classify(error: unknown, attempt: number): TaskApiTransportError {
    if (error instanceof TaskApiTransportError) {
      return error;
    }

    if (error instanceof TaskApiRejectionError) {
      this.logger.error(`Task service rejected the submission: ${error.code}`);
      throw new SubmissionError(error.message, {
        kind: 'RemoteRejection',
        attempts: attempt,
        code: error.code,
        description: error.description,
        cause: error,
      });
    }

    if (error instanceof TaskApiMalformedResponseError) {
      throw new SubmissionError(error.message, {
        kind: 'MalformedResponse',
        attempts: attempt,
        cause: error,
      });
    }

    throw error;
  }
}
