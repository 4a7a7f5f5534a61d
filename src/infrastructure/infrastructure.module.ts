import { Module } from '@nestjs/common';
import { TASK_SERVICE_PORT } from '../application/ports/output/task-service.port';
import { CLOCK_PORT } from '../application/ports/output/clock.port';
import { EVENT_PUBLISHER_PORT } from '../application/ports/output/event-publisher.port';
import { OUTCOME_STORE_PORT } from '../application/ports/output/outcome-store.port';

// Adapters (implementations)
import { TaskApiHttpAdapter } from './adapters/task-service/task-api-http.adapter';
import { SystemClockAdapter } from './adapters/clock/system-clock.adapter';
import { LoggerEventPublisherAdapter } from './adapters/events/logger-event-publisher.adapter';
import { JsonFileOutcomeStoreAdapter } from './adapters/outcome-store/json-file-outcome-store.adapter';

/**
 * Infrastructure Module
 * Binds every output port token to its adapter. The HTTP client and logger
 * come from the global SharedModule.
 */
@Module({
  providers: [
    {
      provide: TASK_SERVICE_PORT,
      useClass: TaskApiHttpAdapter,
    },
    {
      provide: CLOCK_PORT,
      useClass: SystemClockAdapter,
    },
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggerEventPublisherAdapter,
    },
    {
      provide: OUTCOME_STORE_PORT,
      useClass: JsonFileOutcomeStoreAdapter,
    },
  ],
  exports: [TASK_SERVICE_PORT, CLOCK_PORT, EVENT_PUBLISHER_PORT, OUTCOME_STORE_PORT],
})
export class InfrastructureModule {}
