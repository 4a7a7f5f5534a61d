import { Injectable, Logger } from '@nestjs/common';
import { RunTaskCommand, RunTaskPort, RunTaskResult } from '../ports/input/run-task.port';
import { SubmitTaskResult } from '../ports/input/submit-task.port';
import { SubmissionError } from '../../domain/errors/submission.error';
import { SubmitTaskUseCase } from './submit-task.use-case';
import { PollTaskUseCase } from './poll-task.use-case';

/**
 * Run Task Use Case
 * Submit, then poll the returned handle with the same configuration and
 * cancellation signal. The poll timeout starts once the handle is known.
 */
@Injectable()
export class RunTaskUseCase implements RunTaskPort {
  private readonly logger = new Logger(RunTaskUseCase.name);

  constructor(
    private readonly submitTask: SubmitTaskUseCase,
    private readonly pollTask: PollTaskUseCase,
  ) {}

  async execute(command: RunTaskCommand): Promise<RunTaskResult> {
    let submission: SubmitTaskResult;
    try {
      submission = await this.submitTask.execute(command);
    } catch (error) {
      if (error instanceof SubmissionError) {
        this.logger.error(`Task was not submitted (${error.kind}): ${error.message}`);
        return { submitted: false, submissionError: error };
      }
      throw error;
    }

    const outcome = await this.pollTask.execute({
      handle: submission.handle,
      config: command.config,
      signal: command.signal,
    });

    return {
      submitted: true,
      handle: submission.handle,
      attempts: submission.attempts,
      outcome,
    };
  }
}
