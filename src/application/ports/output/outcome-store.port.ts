import { PollOutcome } from '../../../domain/outcomes/poll-outcome';

export const OUTCOME_STORE_PORT = 'OutcomeStorePort';

/**
 * What one run produced, as written to the output file
 */
export interface OutcomeRecord {
  correlationId: string;
  handle?: string;
  outcome?: PollOutcome;
  submissionError?: Record<string, unknown>;
  finishedAt: string;
}

/**
 * Outcome Store Port (Driven Port)
 */
export interface OutcomeStorePort {
  /**
   * Persist a run record and return where it was written
   */
  save(record: OutcomeRecord, destination: string): Promise<string>;
}
