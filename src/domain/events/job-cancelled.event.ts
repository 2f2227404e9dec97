import { ExportJobEvent, ExportJobEventPayload } from './base.event';

export interface JobCancelledEventPayload extends ExportJobEventPayload {
  /** Whether the job had already been picked up by a worker */
  wasRunning: boolean;
}

/**
 * Job Cancelled Event
 */
export class JobCancelledEvent extends ExportJobEvent<JobCancelledEventPayload> {
  constructor(payload: JobCancelledEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'export.job.cancelled';
  }
}
