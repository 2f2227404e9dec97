import { ExportJobEvent, ExportJobEventPayload } from './base.event';

/**
 * Job Started Event
 * Emitted once a worker has claimed the job
 */
export class JobStartedEvent extends ExportJobEvent {
  constructor(payload: ExportJobEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'export.job.started';
  }
}
