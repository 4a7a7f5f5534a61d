import { TaskPollerConfig } from '../../poller-config';
import { TaskRequest } from '../output/task-service.port';
import { PollOutcome } from '../../../domain/outcomes/poll-outcome';
import { SubmissionError } from '../../../domain/errors/submission.error';

/**
 * Run Task Command
 */
export interface RunTaskCommand {
  request: TaskRequest;
  config: TaskPollerConfig;
  signal?: AbortSignal;
}

/**
 * Run Task Result
 */
export type RunTaskResult =
  | { submitted: true; handle: string; attempts: number; outcome: PollOutcome }
  | { submitted: false; submissionError: SubmissionError };

/**
 * Run Task Port (Driving Port / Use Case Interface)
 * Submits a task and polls it to completion
 */
export interface RunTaskPort {
  execute(command: RunTaskCommand): Promise<RunTaskResult>;
}
