import { describe, it, expect, beforeEach } from 'vitest';
import { RunTaskUseCase } from '../../../src/application/use-cases/run-task.use-case';
import { SubmitTaskUseCase } from '../../../src/application/use-cases/submit-task.use-case';
import { PollTaskUseCase } from '../../../src/application/use-cases/poll-task.use-case';
import { SubmissionError } from '../../../src/domain/errors/submission.error';
import { TaskApiTransportError } from '../../../src/domain/errors/task-api.errors';
import {
  FakeClockAdapter,
  InMemoryEventPublisherAdapter,
  InMemoryTaskServiceAdapter,
  statusReply,
} from '../../in-memory-adapters';
import { createPollerConfig } from '../helpers/mock-factories';

describe('RunTaskUseCase', () => {
  let taskService: InMemoryTaskServiceAdapter;
  let clock: FakeClockAdapter;
  let eventPublisher: InMemoryEventPublisherAdapter;
  let useCase: RunTaskUseCase;

  const request = { type: 'ExampleTask' };

  beforeEach(() => {
    taskService = new InMemoryTaskServiceAdapter();
    clock = new FakeClockAdapter();
    eventPublisher = new InMemoryEventPublisherAdapter();
    useCase = new RunTaskUseCase(
      new SubmitTaskUseCase(taskService, clock, eventPublisher),
      new PollTaskUseCase(taskService, clock, eventPublisher),
    );
  });

  it('submits and polls the returned handle to a result', async () => {
    taskService.queueCreateReplies({ handle: 'task-42' });
    taskService.scriptStatuses('task-42', statusReply.pending(), statusReply.ready({ answer: 42 }));

    const result = await useCase.execute({ request, config: createPollerConfig() });

    expect(result).toEqual({
      submitted: true,
      handle: 'task-42',
      attempts: 1,
      outcome: {
        kind: 'ready',
        handle: 'task-42',
        result: { answer: 42 },
        polls: 2,
        elapsedMs: 1000,
      },
    });
    expect(eventPublisher.getEventNames()).toEqual(['task.submitted', 'task.completed']);
  });

  it('starts the poll timeout once the handle is known', async () => {
    taskService.queueCreateReplies(
      new TaskApiTransportError('createTask request failed: ETIMEDOUT'),
      { handle: 'task-42' },
    );
    taskService.scriptStatuses('task-42', statusReply.pending());

    const result = await useCase.execute({
      request,
      config: createPollerConfig({ pollIntervalSeconds: 1, timeoutSeconds: 3 }),
    });

    expect(result).toMatchObject({
      submitted: true,
      attempts: 2,
      outcome: { kind: 'timeout', polls: 3, elapsedMs: 3000 },
    });
    expect(clock.now()).toBe(4000);
  });

  it('reports a submission failure without polling', async () => {
    taskService.queueCreateReplies(new TaskApiTransportError('createTask returned status 500'));

    const result = await useCase.execute({
      request,
      config: createPollerConfig({ maxSubmitRetries: 0 }),
    });

    expect(result.submitted).toBe(false);
    if (result.submitted) {
      throw new Error('Expected the submission to fail');
    }
    expect(result.submissionError).toBeInstanceOf(SubmissionError);
    expect(result.submissionError.kind).toBe('TransportFailure');
    expect(taskService.statusCalls).toEqual([]);
  });

  it('shares the cancellation signal with polling', async () => {
    const controller = new AbortController();
    taskService.queueCreateReplies({ handle: 'task-42' });
    taskService.scriptStatuses('task-42', statusReply.processing());
    clock.onSleep = () => controller.abort();

    const result = await useCase.execute({
      request,
      config: createPollerConfig(),
      signal: controller.signal,
    });

    expect(result).toMatchObject({
      submitted: true,
      outcome: { kind: 'cancelled', handle: 'task-42', polls: 1 },
    });
  });
});
