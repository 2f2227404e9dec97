import { ExportJobEvent, ExportJobEventPayload } from './base.event';

export interface JobFailedEventPayload extends ExportJobEventPayload {
  errorMessage: string;
  failureReason: 'data_source_error' | 'enqueue_failed' | 'execution_error';
}

/**
 * Job Failed Event
 * Emitted when an export job fails permanently
 */
export class JobFailedEvent extends ExportJobEvent<JobFailedEventPayload> {
  constructor(payload: JobFailedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'export.job.failed';
  }

  get errorMessage(): string {
    return this.payload.errorMessage;
  }
}
