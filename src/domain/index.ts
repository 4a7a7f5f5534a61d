/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and depends on nothing
 * outside it apart from immer and uuid.
 */

// Entities
export { TrackedTaskEntity, type TrackedTaskEntityData } from './entities/tracked-task.entity';

// Value Objects
export { TaskStatusVO, TaskStatus } from './value-objects/task-status.vo';
export { TaskLifecycleVO, TaskLifecycle } from './value-objects/task-lifecycle.vo';

// Outcomes
export * from './outcomes/poll-outcome';

// Errors
export {
  SubmissionError,
  type SubmissionErrorKind,
  type SubmissionErrorProps,
} from './errors/submission.error';
export {
  TaskApiTransportError,
  TaskApiRejectionError,
  TaskApiMalformedResponseError,
} from './errors/task-api.errors';

// Events
export * from './events';
