import { DomainEvent } from './base.event';

/**
 * Task Completed Event
 * Emitted when polling observed the Ready status. The result itself is not
 * part of the event.
 */
export interface TaskCompletedEventPayload {
  handle: string;
  polls: number;
  elapsedMs: number;
}

export class TaskCompletedEvent extends DomainEvent {
  constructor(public readonly payload: TaskCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'task.completed';
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
