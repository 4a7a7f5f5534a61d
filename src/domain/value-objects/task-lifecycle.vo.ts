import { TaskStatus, TaskStatusVO } from './task-status.vo';

/**
 * Task Lifecycle Value Object
 * Local state of one handle: the remote statuses plus the exits the poller
 * takes on its own (timeout, cancellation, rejected or undecodable replies)
 */
export enum TaskLifecycle {
  SUBMITTED = 'SUBMITTED',
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  READY = 'READY',
  FAILED = 'FAILED',
  TIMED_OUT = 'TIMED_OUT',
  CANCELLED = 'CANCELLED',
  REJECTED = 'REJECTED',
  MALFORMED = 'MALFORMED',
}

const LOCAL_EXITS = [
  TaskLifecycle.TIMED_OUT,
  TaskLifecycle.CANCELLED,
  TaskLifecycle.REJECTED,
  TaskLifecycle.MALFORMED,
];

const IN_FLIGHT_TARGETS = [
  TaskLifecycle.PENDING,
  TaskLifecycle.PROCESSING,
  TaskLifecycle.READY,
  TaskLifecycle.FAILED,
  ...LOCAL_EXITS,
];

const TRANSITIONS: Record<TaskLifecycle, TaskLifecycle[]> = {
  [TaskLifecycle.SUBMITTED]: IN_FLIGHT_TARGETS,
  [TaskLifecycle.PENDING]: IN_FLIGHT_TARGETS,
  [TaskLifecycle.PROCESSING]: IN_FLIGHT_TARGETS,
  [TaskLifecycle.READY]: [],
  [TaskLifecycle.FAILED]: [],
  [TaskLifecycle.TIMED_OUT]: [],
  [TaskLifecycle.CANCELLED]: [],
  [TaskLifecycle.REJECTED]: [],
  [TaskLifecycle.MALFORMED]: [],
};

const FROM_REMOTE: Record<TaskStatus, TaskLifecycle> = {
  [TaskStatus.PENDING]: TaskLifecycle.PENDING,
  [TaskStatus.PROCESSING]: TaskLifecycle.PROCESSING,
  [TaskStatus.READY]: TaskLifecycle.READY,
  [TaskStatus.FAILED]: TaskLifecycle.FAILED,
};

export class TaskLifecycleVO {
  private constructor(private readonly _value: TaskLifecycle) {}

  static submitted(): TaskLifecycleVO {
    return new TaskLifecycleVO(TaskLifecycle.SUBMITTED);
  }

  static of(value: TaskLifecycle): TaskLifecycleVO {
    return new TaskLifecycleVO(value);
  }

  static fromRemote(status: TaskStatusVO): TaskLifecycleVO {
    return new TaskLifecycleVO(FROM_REMOTE[status.value]);
  }

  get value(): TaskLifecycle {
    return this._value;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this._value].length === 0;
  }

  canTransitionTo(next: TaskLifecycleVO): boolean {
    return TRANSITIONS[this._value].includes(next._value);
  }

  equals(other: TaskLifecycleVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
