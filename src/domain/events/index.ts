/**
 * Domain Events Barrel Export
 */
export { DomainEvent, ExportJobEvent, type ExportJobEventPayload } from './base.event';
export { JobQueuedEvent, type JobQueuedEventPayload } from './job-queued.event';
export { JobStartedEvent } from './job-started.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export { JobFailedEvent, type JobFailedEventPayload } from './job-failed.event';
export { JobCancelledEvent, type JobCancelledEventPayload } from './job-cancelled.event';
