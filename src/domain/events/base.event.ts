import { v4 as uuidv4 } from 'uuid';

/**
 * Base Domain Event
 * All domain events should extend this base class
 */
export abstract class DomainEvent {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor() {
    this.occurredAt = new Date();
    this.eventId = uuidv4();
  }

  abstract get eventName(): string;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}

/**
 * Fields shared by every export job lifecycle event
 */
export interface ExportJobEventPayload {
  jobId: string;
  exportTypeName: string;
  userName: string;
}

export abstract class ExportJobEvent<
  P extends ExportJobEventPayload = ExportJobEventPayload,
> extends DomainEvent {
  protected constructor(public readonly payload: P) {
    super();
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get exportTypeName(): string {
    return this.payload.exportTypeName;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
