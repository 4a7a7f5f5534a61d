/**
 * Poll Outcome
 * Single terminal result of a poll loop. Only `ready` carries a result.
 */

interface OutcomeBase {
  handle: string;
  polls: number;
  elapsedMs: number;
}

export interface ReadyOutcome extends OutcomeBase {
  kind: 'ready';
  /** Opaque payload, exactly as decoded from the service */
  result: unknown;
}

export interface TerminalFailureOutcome extends OutcomeBase {
  kind: 'terminal-failure';
  reason: string;
  code?: string;
}

export interface RemoteRejectionOutcome extends OutcomeBase {
  kind: 'remote-rejection';
  code: string;
  description: string;
}

export interface MalformedResponseOutcome extends OutcomeBase {
  kind: 'malformed-response';
  detail: string;
}

export interface TimeoutOutcome extends OutcomeBase {
  kind: 'timeout';
  lastTransientError?: string;
}

export interface CancelledOutcome extends OutcomeBase {
  kind: 'cancelled';
}

export type PollOutcome =
  | ReadyOutcome
  | TerminalFailureOutcome
  | RemoteRejectionOutcome
  | MalformedResponseOutcome
  | TimeoutOutcome
  | CancelledOutcome;

export type FailedPollOutcome = Exclude<PollOutcome, ReadyOutcome>;

export function isReady(outcome: PollOutcome): outcome is ReadyOutcome {
  return outcome.kind === 'ready';
}

export function describeOutcome(outcome: PollOutcome): string {
  switch (outcome.kind) {
    case 'ready':
      return `Task ${outcome.handle} is ready`;
    case 'terminal-failure':
      return `Task ${outcome.handle} failed: ${outcome.reason}`;
    case 'remote-rejection':
      return `Task service rejected ${outcome.handle}: ${outcome.code} ${outcome.description}`;
    case 'malformed-response':
      return `Task service sent an unusable reply for ${outcome.handle}: ${outcome.detail}`;
    case 'timeout':
      return `Task ${outcome.handle} did not finish within ${outcome.elapsedMs}ms`;
    case 'cancelled':
      return `Polling of task ${outcome.handle} was cancelled`;
  }
}
