/**
 * Use Cases Barrel Export
 */
export { SubmitTaskUseCase } from './submit-task.use-case';
export { PollTaskUseCase } from './poll-task.use-case';
export { RunTaskUseCase } from './run-task.use-case';
