/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  TASK_SERVICE_PORT,
  type TaskServicePort,
  type TaskRequest,
  type TaskServiceEndpoint,
  type TaskCreated,
  type TaskStatusSnapshot,
} from './task-service.port';
export { CLOCK_PORT, type ClockPort } from './clock.port';
export { EVENT_PUBLISHER_PORT, type EventPublisherPort } from './event-publisher.port';
export { OUTCOME_STORE_PORT, type OutcomeStorePort, type OutcomeRecord } from './outcome-store.port';
