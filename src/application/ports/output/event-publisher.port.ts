import { DomainEvent } from '../../../domain/events/base.event';

export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';

/**
 * Event Publisher Port (Driven Port)
 * Receives task.submitted, task.completed and task.failed as they happen.
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;
}
