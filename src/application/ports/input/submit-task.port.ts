import { TaskPollerConfig } from '../../poller-config';
import { TaskRequest } from '../output/task-service.port';

/**
 * Submit Task Command
 */
export interface SubmitTaskCommand {
  request: TaskRequest;
  config: TaskPollerConfig;
  signal?: AbortSignal;
}

/**
 * Submit Task Result
 */
export interface SubmitTaskResult {
  handle: string;
  attempts: number;
}

/**
 * Submit Task Port (Driving Port / Use Case Interface)
 * Creates a task on the remote service, retrying transport failures
 */
export interface SubmitTaskPort {
  /**
   * Resolves with the handle or rejects with a `SubmissionError`
   */
  execute(command: SubmitTaskCommand): Promise<SubmitTaskResult>;
}
