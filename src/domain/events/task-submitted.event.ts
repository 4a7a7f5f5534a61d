import { DomainEvent } from './base.event';

/**
 * Task Submitted Event
 * Emitted once the remote service has accepted a task and returned its handle
 */
export interface TaskSubmittedEventPayload {
  handle: string;
  attempts: number;
}

export class TaskSubmittedEvent extends DomainEvent {
  constructor(public readonly payload: TaskSubmittedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'task.submitted';
  }

  get handle(): string {
    return this.payload.handle;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
