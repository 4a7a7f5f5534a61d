import { produce } from 'immer';
import { TaskLifecycle, TaskLifecycleVO } from '../value-objects/task-lifecycle.vo';
import { TaskStatusVO } from '../value-objects/task-status.vo';

/**
 * Tracked Task Entity
 * Local record of one submitted handle while it is being polled
 *
 * Readonly data plus pure namespace functions; `create` returns the data
 * with bound methods. Every change goes through Immer and returns a new
 * instance.
 *
 * The result payload is not stored here.
 */

export interface TrackedTaskEntityData {
  readonly handle: string;
  readonly lifecycle: TaskLifecycleVO;
  readonly polls: number;
  readonly transientFailures: number;
  readonly lastTransientError?: string;
  /** Epoch milliseconds, from the poller's clock */
  readonly submittedAt: number;
  readonly lastPolledAt?: number;
  readonly finishedAt?: number;
}

export interface TrackedTaskEntity extends TrackedTaskEntityData {
  isTerminal(): boolean;

  recordPoll(status: TaskStatusVO, at: number): TrackedTaskEntity;
  recordTransientFailure(message: string, at: number): TrackedTaskEntity;
  finish(exit: TaskLifecycle, at: number): TrackedTaskEntity;

  toJSON(): ReturnType<typeof TrackedTaskEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace TrackedTaskEntity {
  export interface CreateProps {
    handle: string;
    submittedAt: number;
  }

  export function create(props: CreateProps): TrackedTaskEntity {
    if (!props.handle || props.handle.trim().length === 0) {
      throw new Error('Task handle is required');
    }

    return attachMethods({
      handle: props.handle,
      lifecycle: TaskLifecycleVO.submitted(),
      polls: 0,
      transientFailures: 0,
      submittedAt: props.submittedAt,
    });
  }

  function attachMethods(data: TrackedTaskEntityData): TrackedTaskEntity {
    return {
      ...data,
      isTerminal: () => isTerminal(data),
      recordPoll: (status: TaskStatusVO, at: number) => recordPoll(data, status, at),
      recordTransientFailure: (message: string, at: number) =>
        recordTransientFailure(data, message, at),
      finish: (exit: TaskLifecycle, at: number) => finish(data, exit, at),
      toJSON: () => toJSON(data),
    };
  }

  export function isTerminal(task: TrackedTaskEntityData): boolean {
    return task.lifecycle.isTerminal();
  }

  function assertPollable(task: TrackedTaskEntityData): void {
    if (isTerminal(task)) {
      throw new Error(
        `Task ${task.handle} is already ${task.lifecycle.toString()} and cannot be polled`,
      );
    }
  }

  export function recordPoll(
    task: TrackedTaskEntityData,
    status: TaskStatusVO,
    at: number,
  ): TrackedTaskEntity {
    assertPollable(task);
    const next = TaskLifecycleVO.fromRemote(status);

    const updated = produce(task, (draft) => {
      draft.polls += 1;
      draft.lastPolledAt = at;
      draft.lifecycle = next;
      if (next.isTerminal()) {
        draft.finishedAt = at;
      }
    });
    return attachMethods(updated);
  }

  export function recordTransientFailure(
    task: TrackedTaskEntityData,
    message: string,
    at: number,
  ): TrackedTaskEntity {
    assertPollable(task);

    const updated = produce(task, (draft) => {
      draft.polls += 1;
      draft.transientFailures += 1;
      draft.lastTransientError = message;
      draft.lastPolledAt = at;
    });
    return attachMethods(updated);
  }

  /**
   * Close the record with one of the exits the poller decides locally.
   * A malformed or rejected reply still counts as a poll that was issued.
   */
  export function finish(
    task: TrackedTaskEntityData,
    exit: TaskLifecycle,
    at: number,
  ): TrackedTaskEntity {
    const next = TaskLifecycleVO.of(exit);
    if (!task.lifecycle.canTransitionTo(next)) {
      throw new Error(
        `Invalid transition for task ${task.handle}: ${task.lifecycle.toString()} -> ${exit}`,
      );
    }

    const countsAsPoll = exit === TaskLifecycle.REJECTED || exit === TaskLifecycle.MALFORMED;

    const updated = produce(task, (draft) => {
      if (countsAsPoll) {
        draft.polls += 1;
        draft.lastPolledAt = at;
      }
      draft.lifecycle = next;
      draft.finishedAt = at;
    });
    return attachMethods(updated);
  }

  export function toJSON(task: TrackedTaskEntityData) {
    return {
      handle: task.handle,
      lifecycle: task.lifecycle.toString(),
      polls: task.polls,
      transientFailures: task.transientFailures,
      lastTransientError: task.lastTransientError,
      submittedAt: task.submittedAt,
      lastPolledAt: task.lastPolledAt,
      finishedAt: task.finishedAt,
    };
  }
}
