import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Interface for publishing export job lifecycle events
 */
export interface EventPublisherPort {
  /**
   * Publish a single domain event
   */
  publish(event: DomainEvent): Promise<void>;

  /**
   * Publish an event without waiting (fire and forget); failures are logged
   */
  publishAsync(event: DomainEvent): void;
}
