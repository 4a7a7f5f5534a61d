/**
 * Task Status Value Object
 * Status of a task as reported by the remote service
 */
export enum TaskStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  READY = 'READY',
  FAILED = 'FAILED',
}

const WIRE_VALUES: ReadonlyMap<string, TaskStatus> = new Map([
  ['idle', TaskStatus.PENDING],
  ['queued', TaskStatus.PENDING],
  ['pending', TaskStatus.PENDING],
  ['processing', TaskStatus.PROCESSING],
  ['ready', TaskStatus.READY],
  ['failed', TaskStatus.FAILED],
]);

export class TaskStatusVO {
  private constructor(private readonly _value: TaskStatus) {}

  static fromString(value: string): TaskStatusVO {
    const status = TaskStatusVO.tryFromString(value);
    if (!status) {
      throw new Error(`Invalid task status: ${value}`);
    }
    return status;
  }

  static tryFromString(value: string): TaskStatusVO | null {
    const status = WIRE_VALUES.get(value.trim().toLowerCase());
    return status ? new TaskStatusVO(status) : null;
  }

  static pending(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.PENDING);
  }

  static processing(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.PROCESSING);
  }

  static ready(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.READY);
  }

  static failed(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.FAILED);
  }

  get value(): TaskStatus {
    return this._value;
  }

  isReady(): boolean {
    return this._value === TaskStatus.READY;
  }

  isFailed(): boolean {
    return this._value === TaskStatus.FAILED;
  }

  toString(): string {
    return this._value;
  }
}
