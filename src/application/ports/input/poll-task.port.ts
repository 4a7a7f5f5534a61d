import { TaskPollerConfig } from '../../poller-config';
import { PollOutcome } from '../../../domain/outcomes/poll-outcome';

/**
 * Poll Task Command
 */
export interface PollTaskCommand {
  handle: string;
  config: TaskPollerConfig;
  signal?: AbortSignal;
}

/**
 * Poll Task Port (Driving Port / Use Case Interface)
 * Polls one handle until it reaches a terminal outcome
 */
export interface PollTaskPort {
  execute(command: PollTaskCommand): Promise<PollOutcome>;
}
