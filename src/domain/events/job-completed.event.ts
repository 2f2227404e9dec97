import { ExportJobEvent, ExportJobEventPayload } from './base.event';

export interface JobCompletedEventPayload extends ExportJobEventPayload {
  fileName: string;
  exportedCount: number;
  durationMs: number;
}

/**
 * Job Completed Event
 * Emitted when the output file has been published
 */
export class JobCompletedEvent extends ExportJobEvent<JobCompletedEventPayload> {
  constructor(payload: JobCompletedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'export.job.completed';
  }

  get fileName(): string {
    return this.payload.fileName;
  }
}
