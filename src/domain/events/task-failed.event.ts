import { DomainEvent } from './base.event';
import { FailedPollOutcome } from '../outcomes/poll-outcome';

/**
 * Task Failed Event
 * Emitted when polling ended without a result
 */
export interface TaskFailedEventPayload {
  handle: string;
  failureReason: FailedPollOutcome['kind'];
  message: string;
  polls: number;
  elapsedMs: number;
}

export class TaskFailedEvent extends DomainEvent {
  constructor(public readonly payload: TaskFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'task.failed';
  }

  get handle(): string {
    return this.payload.handle;
  }

  get failureReason(): string {
    return this.payload.failureReason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
