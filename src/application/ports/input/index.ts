/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export {
  type SubmitTaskPort,
  type SubmitTaskCommand,
  type SubmitTaskResult,
} from './submit-task.port';
export { type PollTaskPort, type PollTaskCommand } from './poll-task.port';
export { type RunTaskPort, type RunTaskCommand, type RunTaskResult } from './run-task.port';
