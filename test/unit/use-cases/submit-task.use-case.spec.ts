import { describe, it, expect, beforeEach } from 'vitest';
import { SubmitTaskUseCase } from '../../../src/application/use-cases/submit-task.use-case';
import { SubmissionError } from '../../../src/domain/errors/submission.error';
import {
  TaskApiMalformedResponseError,
  TaskApiRejectionError,
  TaskApiTransportError,
} from '../../../src/domain/errors/task-api.errors';
import { TaskSubmittedEvent } from '../../../src/domain/events/task-submitted.event';
import {
  FakeClockAdapter,
  InMemoryEventPublisherAdapter,
  InMemoryTaskServiceAdapter,
} from '../../in-memory-adapters';
import {
  TEST_API_KEY,
  TEST_BASE_URL,
  captureRejection,
  createPollerConfig,
} from '../helpers/mock-factories';

describe('SubmitTaskUseCase', () => {
  let taskService: InMemoryTaskServiceAdapter;
  let clock: FakeClockAdapter;
  let eventPublisher: InMemoryEventPublisherAdapter;
  let useCase: SubmitTaskUseCase;

  const request = { type: 'ExampleTask', payload: { value: 42 } };
  const transportError = () =>
    new TaskApiTransportError('createTask request failed: connect ECONNREFUSED');

  beforeEach(() => {
    taskService = new InMemoryTaskServiceAdapter();
    clock = new FakeClockAdapter();
    eventPublisher = new InMemoryEventPublisherAdapter();
    useCase = new SubmitTaskUseCase(taskService, clock, eventPublisher);
  });

  describe('successful submission', () => {
    it('returns the handle after a single attempt', async () => {
      taskService.queueCreateReplies({ handle: 'task-abc' });

      const result = await useCase.execute({ request, config: createPollerConfig() });

      expect(result).toEqual({ handle: 'task-abc', attempts: 1 });
      expect(taskService.createCalls).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('passes the request through untouched with the configured endpoint', async () => {
      await useCase.execute({
        request,
        config: createPollerConfig({ requestTimeoutMs: 5000 }),
      });

      expect(taskService.createCalls[0].request).toBe(request);
      expect(taskService.createCalls[0].endpoint).toEqual({
        baseUrl: TEST_BASE_URL,
        credential: TEST_API_KEY,
        requestTimeoutMs: 5000,
      });
    });

    it('trims whitespace around the returned handle', async () => {
      taskService.queueCreateReplies({ handle: '  task-padded \n' });

      const result = await useCase.execute({ request, config: createPollerConfig() });

      expect(result.handle).toBe('task-padded');
    });

    it('publishes a task.submitted event', async () => {
      taskService.queueCreateReplies({ handle: 'task-abc' });

      await useCase.execute({ request, config: createPollerConfig() });

      const event = eventPublisher.getLastEvent();
      expect(event).toBeInstanceOf(TaskSubmittedEvent);
      expect(event?.eventName).toBe('task.submitted');
      expect(event?.toJSON()).toMatchObject({ payload: { handle: 'task-abc', attempts: 1 } });
    });
  });

  describe('retries with backoff', () => {
    it('retries transport failures and succeeds on a later attempt', async () => {
      taskService.queueCreateReplies(transportError(), transportError(), { handle: 'task-9' });

      const result = await useCase.execute({ request, config: createPollerConfig() });

      expect(result).toEqual({ handle: 'task-9', attempts: 3 });
      expect(taskService.createCalls).toHaveLength(3);
      expect(clock.sleeps).toEqual([1000, 2000]);
    });

    it('stops after maxSubmitRetries + 1 attempts with exponential delays', async () => {
      taskService.queueCreateReplies(
        transportError(),
        transportError(),
        transportError(),
        transportError(),
        { handle: 'never-reached' },
      );

      const error = await captureRejection(
        useCase.execute({ request, config: createPollerConfig({ maxSubmitRetries: 3 }) }),
      );

      expect(error).toBeInstanceOf(SubmissionError);
      expect(error).toMatchObject({ kind: 'RetriesExhausted', attempts: 4 });
      expect(taskService.createCalls).toHaveLength(4);
      expect(clock.sleeps).toEqual([1000, 2000, 4000]);
    });

    it('keeps the last transport error as the cause', async () => {
      const last = new TaskApiTransportError('createTask returned status 503', { statusCode: 503 });
      taskService.queueCreateReplies(transportError(), last);

      const error = await captureRejection(
        useCase.execute({ request, config: createPollerConfig({ maxSubmitRetries: 1 }) }),
      );

      expect(error).toBeInstanceOf(SubmissionError);
      expect(error).toMatchObject({ kind: 'RetriesExhausted', attempts: 2, cause: last });
    });

    it('waits the same delay between attempts with fixed backoff', async () => {
      taskService.queueCreateReplies(transportError(), transportError(), transportError());

      await useCase.execute({
        request,
        config: createPollerConfig({ backoffStrategy: 'fixed', backoffBaseSeconds: 2 }),
      });

      expect(clock.sleeps).toEqual([2000, 2000, 2000]);
    });

    it('reports a plain transport failure when retries are disabled', async () => {
      taskService.queueCreateReplies(transportError());

      const error = await captureRejection(
        useCase.execute({ request, config: createPollerConfig({ maxSubmitRetries: 0 }) }),
      );

      expect(error).toMatchObject({ kind: 'TransportFailure', attempts: 1 });
      expect(clock.sleeps).toEqual([]);
    });
  });

  describe('non-retryable failures', () => {
    it('does not retry a rejection', async () => {
      taskService.queueCreateReplies(
        new TaskApiRejectionError('ERROR_KEY_DOES_NOT_EXIST', 'Account authorization key not found'),
      );

      const error = await captureRejection(useCase.execute({ request, config: createPollerConfig() }));

      expect(error).toMatchObject({
        kind: 'RemoteRejection',
        attempts: 1,
        code: 'ERROR_KEY_DOES_NOT_EXIST',
        description: 'Account authorization key not found',
      });
      expect(taskService.createCalls).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('does not retry a malformed reply', async () => {
      taskService.queueCreateReplies(new TaskApiMalformedResponseError('taskId: Required'));

      const error = await captureRejection(useCase.execute({ request, config: createPollerConfig() }));

      expect(error).toMatchObject({
        kind: 'MalformedResponse',
        attempts: 1,
        message: 'Malformed task service response: taskId: Required',
      });
      expect(taskService.createCalls).toHaveLength(1);
    });

    it('treats an empty handle as a malformed reply', async () => {
      taskService.queueCreateReplies({ handle: '   ' });

      const error = await captureRejection(useCase.execute({ request, config: createPollerConfig() }));

      expect(error).toMatchObject({ kind: 'MalformedResponse', attempts: 1 });
      expect(eventPublisher.getPublishedEvents()).toEqual([]);
    });

    it('lets unexpected errors through unchanged', async () => {
      const bug = new TypeError('cannot read properties of undefined');
      taskService.queueCreateReplies(bug);

      await expect(useCase.execute({ request, config: createPollerConfig() })).rejects.toBe(bug);
    });
  });

  describe('cancellation', () => {
    it('makes no attempt when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await captureRejection(
        useCase.execute({ request, config: createPollerConfig(), signal: controller.signal }),
      );

      expect(error).toMatchObject({ kind: 'Cancelled', attempts: 0 });
      expect(taskService.createCalls).toEqual([]);
    });

    it('stops retrying once cancelled during backoff', async () => {
      const controller = new AbortController();
      taskService.queueCreateReplies(transportError(), transportError());
      clock.onSleep = () => controller.abort();

      const error = await captureRejection(
        useCase.execute({ request, config: createPollerConfig(), signal: controller.signal }),
      );

      expect(error).toMatchObject({ kind: 'Cancelled', attempts: 1 });
      expect(taskService.createCalls).toHaveLength(1);
      expect(clock.now()).toBe(0);
    });
  });
});
