/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { TaskSubmittedEvent, type TaskSubmittedEventPayload } from './task-submitted.event';
export { TaskCompletedEvent, type TaskCompletedEventPayload } from './task-completed.event';
export { TaskFailedEvent, type TaskFailedEventPayload } from './task-failed.event';
