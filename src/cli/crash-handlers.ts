import { EventEmitter } from 'events';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * Log uncaught exceptions and unhandled rejections through the run logger,
 * then exit with status 1.
 */
export function registerCrashHandlers(
  logger: PinoLoggerService,
  target: EventEmitter = process,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  target.on('uncaughtException', (error: Error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    exit(1);
  });

  target.on('unhandledRejection', (reason: unknown) => {
    logger.error(
      { reason: reason instanceof Error ? reason.message : String(reason) },
      'Unhandled rejection',
    );
    exit(1);
  });
}
