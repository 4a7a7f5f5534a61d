import { Inject, Injectable, Logger } from '@nestjs/common';
import { PollTaskCommand, PollTaskPort } from '../ports/input/poll-task.port';
import {
  TASK_SERVICE_PORT,
  TaskServicePort,
  TaskStatusSnapshot,
} from '../ports/output/task-service.port';
import { CLOCK_PORT, ClockPort } from '../ports/output/clock.port';
import { EVENT_PUBLISHER_PORT, EventPublisherPort } from '../ports/output/event-publisher.port';
import { toEndpoint } from '../poller-config';
import { TrackedTaskEntity } from '../../domain/entities/tracked-task.entity';
import { TaskLifecycle } from '../../domain/value-objects/task-lifecycle.vo';
import { PollOutcome, describeOutcome } from '../../domain/outcomes/poll-outcome';
import {
  TaskApiMalformedResponseError,
  TaskApiRejectionError,
  TaskApiTransportError,
} from '../../domain/errors/task-api.errors';
import { TaskCompletedEvent } from '../../domain/events/task-completed.event';
import { TaskFailedEvent } from '../../domain/events/task-failed.event';

/**
 * Poll Task Use Case
 * Queries the status of one handle until the service reports Ready or
 * Failed, the wall-clock budget runs out, or the caller cancels.
 *
 * The first query goes out immediately; later ones follow every
 * `pollIntervalSeconds`. Transport failures are retried at the next interval
 * and only ever show up as `lastTransientError` on a timeout.
 */
@Injectable()
export class PollTaskUseCase implements PollTaskPort {
  private readonly logger = new Logger(PollTaskUseCase.name);

  constructor(
    @Inject(TASK_SERVICE_PORT) private readonly taskService: TaskServicePort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: PollTaskCommand): Promise<PollOutcome> {
    const { handle, config, signal } = command;
    const endpoint = toEndpoint(config);
    const intervalMs = config.pollIntervalSeconds * 1000;
    const startedAt = this.clock.now();
    const deadline = startedAt + config.timeoutSeconds * 1000;

    let task = TrackedTaskEntity.create({ handle, submittedAt: startedAt });

    this.logger.debug(
      `Polling task ${handle} every ${intervalMs}ms for up to ${config.timeoutSeconds}s`,
    );

    for (;;) {
      if (signal?.aborted) {
        task = task.finish(TaskLifecycle.CANCELLED, this.clock.now());
        return this.conclude(task, startedAt, { kind: 'cancelled' });
      }

      if (this.clock.now() >= deadline) {
        task = task.finish(TaskLifecycle.TIMED_OUT, this.clock.now());
        return this.conclude(task, startedAt, {
          kind: 'timeout',
          lastTransientError: task.lastTransientError,
        });
      }

      // A single query may not outlive the poll budget
      const remaining = deadline - this.clock.now();
      const queryEndpoint = {
        ...endpoint,
        requestTimeoutMs: Math.min(endpoint.requestTimeoutMs, remaining),
      };

      let snapshot: TaskStatusSnapshot;
      try {
        snapshot = await this.taskService.getTaskStatus(handle, queryEndpoint);
      } catch (error) {
        if (error instanceof TaskApiRejectionError) {
          task = task.finish(TaskLifecycle.REJECTED, this.clock.now());
          return this.conclude(task, startedAt, {
            kind: 'remote-rejection',
            code: error.code,
            description: error.description,
          });
        }

        if (error instanceof TaskApiMalformedResponseError) {
          task = task.finish(TaskLifecycle.MALFORMED, this.clock.now());
          return this.conclude(task, startedAt, { kind: 'malformed-response', detail: error.detail });
        }

        if (!(error instanceof TaskApiTransportError)) {
          throw error;
        }

        task = task.recordTransientFailure(error.message, this.clock.now());
        this.logger.warn(`Status query ${task.polls} for task ${handle} failed: ${error.message}`);

        await this.waitForNextPoll(deadline, intervalMs, signal);
        continue;
      }

      if (snapshot.status.isReady() && (snapshot.result === undefined || snapshot.result === null)) {
        task = task.finish(TaskLifecycle.MALFORMED, this.clock.now());
        return this.conclude(task, startedAt, {
          kind: 'malformed-response',
          detail: 'Ready status without a result payload',
        });
      }

      task = task.recordPoll(snapshot.status, this.clock.now());

      if (snapshot.status.isReady()) {
        return this.conclude(task, startedAt, { kind: 'ready', result: snapshot.result });
      }

      if (snapshot.status.isFailed()) {
        return this.conclude(task, startedAt, {
          kind: 'terminal-failure',
          reason: snapshot.failureReason ?? 'Task failed without a reason',
          code: snapshot.failureCode,
        });
      }

      this.logger.debug(`Task ${handle} is ${snapshot.status.toString()} after ${task.polls} poll(s)`);

      await this.waitForNextPoll(deadline, intervalMs, signal);
    }
  }

  /**
   * Sleep until the next query, never past the deadline.
   */
  private async waitForNextPoll(
    deadline: number,
    intervalMs: number,
    signal?: AbortSignal,
  ): Promise<void> {
    const remaining = deadline - this.clock.now();
    if (remaining <= 0) {
      return;
    }
    await this.clock.sleep(Math.min(intervalMs, remaining), signal);
  }

  private async conclude(
    task: TrackedTaskEntity,
    startedAt: number,
    details: DistributiveOmit<PollOutcome, 'handle' | 'polls' | 'elapsedMs'>,
  ): Promise<PollOutcome> {
    const outcome: PollOutcome = {
      ...details,
      handle: task.handle,
      polls: task.polls,
      elapsedMs: (task.finishedAt ?? this.clock.now()) - startedAt,
    };

    if (outcome.kind === 'ready') {
      this.logger.log(`${describeOutcome(outcome)} after ${outcome.polls} poll(s)`);
      await this.eventPublisher.publish(
        new TaskCompletedEvent({
          handle: outcome.handle,
          polls: outcome.polls,
          elapsedMs: outcome.elapsedMs,
        }),
      );
    } else {
      this.logger.warn(describeOutcome(outcome));
      await this.eventPublisher.publish(
        new TaskFailedEvent({
          handle: outcome.handle,
          failureReason: outcome.kind,
          message: describeOutcome(outcome),
          polls: outcome.polls,
          elapsedMs: outcome.elapsedMs,
        }),
      );
    }

    return outcome;
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
