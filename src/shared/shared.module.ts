import { Global, Module } from '@nestjs/common';
import { HttpClientService } from './http/http-client.service';
import { PinoLoggerService } from './logging/pino-logger.service';

/**
 * Logger and HTTP client, one instance each for the whole context.
 * Consumers scope the logger with `forContext`.
 */
@Global()
@Module({
  providers: [PinoLoggerService, HttpClientService],
  exports: [PinoLoggerService, HttpClientService],
})
export class SharedModule {}
