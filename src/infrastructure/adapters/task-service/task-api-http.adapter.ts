import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import {
  TaskCreated,
  TaskRequest,
  TaskServiceEndpoint,
  TaskServicePort,
  TaskStatusSnapshot,
} from '../../../application/ports/output/task-service.port';
import { TaskStatusVO } from '../../../domain/value-objects/task-status.vo';
import {
  TaskApiMalformedResponseError,
  TaskApiRejectionError,
  TaskApiTransportError,
} from '../../../domain/errors/task-api.errors';

const envelopeSchema = z.object({
  errorId: z.number().int(),
  errorCode: z.string().optional(),
  errorDescription: z.string().optional(),
});

const createTaskResponseSchema = z.object({
  taskId: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
});

const taskResultResponseSchema = z.object({
  status: z.string(),
  solution: z.unknown().optional(),
  errorCode: z.string().optional(),
  errorDescription: z.string().optional(),
});

type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Task API HTTP Adapter
 * Implements TaskServicePort for services speaking the createTask /
 * getTaskResult JSON protocol:
 *
 * - `POST /createTask` `{ clientKey, task }` -> `{ errorId: 0, taskId }`
 * - `POST /getTaskResult` `{ clientKey, taskId }` -> `{ errorId: 0, status, solution? }`
 *
 * A non-zero `errorId` is the service rejecting the call, except on a
 * `failed` task result where it carries the failure reason.
 */
@Injectable()
export class TaskApiHttpAdapter implements TaskServicePort {
  private readonly logger: PinoLoggerService;
  constructor(
    private readonly httpClient: HttpClientService,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(TaskApiHttpAdapter.name);
  }

  async createTask(request: TaskRequest, endpoint: TaskServiceEndpoint): Promise<TaskCreated> {
    const response = await this.send(endpoint, 'createTask', {
      clientKey: endpoint.credential,
      task: request,
    });

    const envelope = this.readEnvelope(response);
    if (envelope && envelope.errorId !== 0) {
      throw this.rejection(envelope);
    }
    this.assertSuccess(response, 'createTask');

    const parsed = createTaskResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new TaskApiMalformedResponseError(
        `createTask reply has no usable taskId (${this.describeIssues(parsed.error)})`,
      );
    }

    this.logger.debug({ handle: parsed.data.taskId }, 'Task created');

    return { handle: parsed.data.taskId };
  }

  async getTaskStatus(handle: string, endpoint: TaskServiceEndpoint): Promise<TaskStatusSnapshot> {
    const response = await this.send(endpoint, 'getTaskResult', {
      clientKey: endpoint.credential,
      taskId: handle,
    });

    const envelope = this.readEnvelope(response);
    const reportedFailure = this.isFailedStatus(response.body);

    if (envelope && envelope.errorId !== 0 && !reportedFailure) {
      throw this.rejection(envelope);
    }
    if (!reportedFailure) {
      this.assertSuccess(response, 'getTaskResult');
    }

    const parsed = taskResultResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new TaskApiMalformedResponseError(
        `getTaskResult reply for ${handle} is unreadable (${this.describeIssues(parsed.error)})`,
      );
    }

    const status = TaskStatusVO.tryFromString(parsed.data.status);
    if (!status) {
      throw new TaskApiMalformedResponseError(
        `getTaskResult reply for ${handle} has unknown status "${parsed.data.status}"`,
      );
    }

    this.logger.debug({ handle, status: status.toString() }, 'Task status received');

    return {
      handle,
      status,
      result: parsed.data.solution,
      failureReason: parsed.data.errorDescription || parsed.data.errorCode,
      failureCode: parsed.data.errorCode,
    };
  }

  private async send(
    endpoint: TaskServiceEndpoint,
    method: 'createTask' | 'getTaskResult',
    body: Record<string, unknown>,
  ): Promise<HttpResponse> {
    const url = `${endpoint.baseUrl.replace(/\/+$/, '')}/${method}`;

    try {
      return await this.httpClient.post(url, body, {
        timeout: endpoint.requestTimeoutMs,
        maxRetries: 0,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TaskApiTransportError(`${method} request failed: ${message}`, { cause: error });
    }
  }

  private readEnvelope(response: HttpResponse): Envelope | null {
    const parsed = envelopeSchema.safeParse(response.body);
    return parsed.success ? parsed.data : null;
  }

  private assertSuccess(response: HttpResponse, method: string): void {
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new TaskApiTransportError(`${method} returned status ${response.statusCode}`, {
        statusCode: response.statusCode,
      });
    }
  }

  private isFailedStatus(body: unknown): boolean {
    const parsed = taskResultResponseSchema.safeParse(body);
    return parsed.success && TaskStatusVO.tryFromString(parsed.data.status)?.isFailed() === true;
  }

  private rejection(envelope: Envelope): TaskApiRejectionError {
    const code = envelope.errorCode ?? `ERROR_ID_${envelope.errorId}`;
    this.logger.warn({ errorCode: code }, 'Task service rejected the request');
    return new TaskApiRejectionError(code, envelope.errorDescription ?? '');
  }

  private describeIssues(error: z.ZodError): string {
    return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
  }
}
