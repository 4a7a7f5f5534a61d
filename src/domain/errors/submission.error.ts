export type SubmissionErrorKind =
  | 'TransportFailure'
  | 'MalformedResponse'
  | 'RetriesExhausted'
  | 'RemoteRejection'
  | 'Cancelled';

export interface SubmissionErrorProps {
  kind: SubmissionErrorKind;
  attempts: number;
  cause?: unknown;
  code?: string;
  description?: string;
}

/**
 * Submission Error
 * Thrown when a task could not be created. Fatal for the invocation.
 */
export class SubmissionError extends Error {
  readonly kind: SubmissionErrorKind;
  readonly attempts: number;
  readonly code?: string;
  readonly description?: string;

  constructor(message: string, props: SubmissionErrorProps) {
    super(message, { cause: props.cause });
    this.name = 'SubmissionError';
    this.kind = props.kind;
    this.attempts = props.attempts;
    this.code = props.code;
    this.description = props.description;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      attempts: this.attempts,
      code: this.code,
      description: this.description,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}
