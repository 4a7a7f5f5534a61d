import { Injectable, Logger } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Logger Event Publisher Adapter
 * Implements EventPublisherPort by writing events to the application log
 */
@Injectable()
export class LoggerEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(LoggerEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    this.logger.log(`[EVENT] ${event.eventName} ${JSON.stringify(event.toJSON())}`);
  }
}
