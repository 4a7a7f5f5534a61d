import { Inject, Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';
import { AppConfig } from '../../config/configuration';

export const LOG_DESTINATION = 'LogDestination';

/**
 * Request fields that carry the task service credential
 */
export const REDACTED_PATHS = [
  'clientKey',
  '*.clientKey',
  'authCredential',
  '*.authCredential',
  'credential',
  '*.credential',
];

export function buildLoggerOptions(logLevel: string, nodeEnv?: string): LoggerOptions {
  return {
    level: logLevel,
    ...(nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service,env',
          destination: 2,
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    base: {
      service: 'async-task-poller',
      env: nodeEnv,
    },
  };
}

// Nest's Logger appends its context after any other parameters
function contextFrom(params: unknown[]): string | undefined {
  const last = params[params.length - 1];
  return typeof last === 'string' ? last : undefined;
}

function messageFrom(params: unknown[]): string {
  return typeof params[0] === 'string' ? params[0] : '';
}

/**
 * Nest LoggerService over pino. Scoped copies from `forContext` and
 * `withCorrelationId` share the underlying destination.
 *
 * Logs go to stderr so stdout stays free for the task result.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    @Optional() @Inject(LOG_DESTINATION) destination?: DestinationStream,
  ) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });
    const options = buildLoggerOptions(logLevel, nodeEnv);

    if (destination) {
      this.logger = pino({ ...options, transport: undefined }, destination);
    } else {
      this.logger = options.transport ? pino(options) : pino(options, pino.destination(2));
    }
  }

  private formatMessage(message: string, context?: string): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, ...optionalParams: unknown[]): void {
    this.logger.info(this.formatMessage(message, contextFrom(optionalParams)));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(message: string | Record<string, unknown>, trace?: string, context?: string): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace || '');
    } else {
      this.logger.error({ trace, ...this.formatMessage(message, context) });
    }
  }

  warn(message: string | Record<string, unknown>, ...optionalParams: unknown[]): void {
    if (typeof message === 'object') {
      this.logger.warn({ ...message, context: this.context }, messageFrom(optionalParams));
    } else {
      this.logger.warn(this.formatMessage(message, contextFrom(optionalParams)));
    }
  }

  debug(message: string | Record<string, unknown>, ...optionalParams: unknown[]): void {
    if (typeof message === 'object') {
      this.logger.debug({ ...message, context: this.context }, messageFrom(optionalParams));
    } else {
      this.logger.debug(this.formatMessage(message, contextFrom(optionalParams)));
    }
  }

  verbose(message: string, ...optionalParams: unknown[]): void {
    this.logger.trace(this.formatMessage(message, contextFrom(optionalParams)));
  }

  /**
   * Copy of this logger with its own context; the shared instance is left as is
   */
  forContext(context: string): PinoLoggerService {
    const scoped = this.child({});
    scoped.context = context;
    return scoped;
  }

  withCorrelationId(correlationId: string): PinoLoggerService {
    return this.child({ correlationId });
  }

  private child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    childLogger.context = this.context;
    return childLogger;
  }
}
