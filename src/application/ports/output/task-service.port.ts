import { TaskStatusVO } from '../../../domain/value-objects/task-status.vo';

export const TASK_SERVICE_PORT = 'TaskServicePort';

/**
 * Opaque description of the work to submit. Owned by the caller and never
 * modified by the poller.
 */
export type TaskRequest = Readonly<Record<string, unknown>>;

/**
 * Where and as whom to talk to the task service, for one call
 */
export interface TaskServiceEndpoint {
  baseUrl: string;
  credential: string;
  requestTimeoutMs: number;
}

export interface TaskCreated {
  handle: string;
}

export interface TaskStatusSnapshot {
  handle: string;
  status: TaskStatusVO;
  /** Present when the service sent a result payload with the status */
  result?: unknown;
  failureReason?: string;
  failureCode?: string;
}

/**
 * Task Service Port (Driven Port)
 * Interface to a remote asynchronous-task API
 *
 * Implementations throw `TaskApiTransportError` for anything worth retrying
 * (connection failures, timeouts, non-success HTTP status),
 * `TaskApiRejectionError` when the service answers with an error envelope and
 * `TaskApiMalformedResponseError` when the reply cannot be decoded.
 */
export interface TaskServicePort {
  /**
   * Submit a task and return its handle
   */
  createTask(request: TaskRequest, endpoint: TaskServiceEndpoint): Promise<TaskCreated>;

  /**
   * Query the current status of a task
   */
  getTaskStatus(handle: string, endpoint: TaskServiceEndpoint): Promise<TaskStatusSnapshot>;
}
