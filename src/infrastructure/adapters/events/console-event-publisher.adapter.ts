import { Injectable, Logger } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Console Event Publisher Adapter
 * Implements EventPublisherPort by logging job lifecycle events
 */
@Injectable()
export class ConsoleEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(ConsoleEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    this.logger.log(`[EVENT] ${event.eventName} ${JSON.stringify(event.toJSON())}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error) => {
      this.logger.error(`Failed to publish event ${event.eventName}:`, error);
    });
  }
}
