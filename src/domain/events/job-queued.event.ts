import { ExportJobEvent, ExportJobEventPayload } from './base.event';

export interface JobQueuedEventPayload extends ExportJobEventPayload {
  providerName: string;
}

/**
 * Job Queued Event
 * Emitted when a run request has been accepted and recorded
 */
export class JobQueuedEvent extends ExportJobEvent<JobQueuedEventPayload> {
  constructor(payload: JobQueuedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'export.job.queued';
  }
}
