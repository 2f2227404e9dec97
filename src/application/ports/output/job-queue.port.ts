import { ExportJobEntity } from '../../../domain/entities/export-job.entity';

/**
 * Message carried by a queue entry; the job record holds everything else
 */
export interface ExportJobMessage {
  jobId: string;
  exportTypeName: string;
  enqueuedAt: string;
}

/**
 * Job Queue Port (Driven Port)
 * Durable hand-off of accepted jobs to the background workers
 */
export interface JobQueuePort {
  /**
   * Record a queue entry for the job; resolves once the queue has accepted it.
   * Returns the job id the entry is addressed by.
   */
  enqueue(job: ExportJobEntity): Promise<string>;

  /**
   * Best-effort removal of an entry that has not been picked up yet.
   * Unknown or already consumed ids are ignored.
   */
  remove(jobId: string): Promise<void>;
}
