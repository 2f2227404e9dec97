import { ExportJobChanges, ExportJobEntity } from '../../../domain/entities/export-job.entity';
import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';

/**
 * Job State Repository Port (Driven Port)
 * Durable record of every export job and its latest notification
 *
 * Status changes are compare-and-set: concurrent workers and cancel requests
 * race on the same record, and only one of them may win a transition.
 */
export interface JobStateRepositoryPort {
  /**
   * Persist a new job; fails if the jobId already exists
   */
  save(job: ExportJobEntity): Promise<void>;

  findById(jobId: string): Promise<ExportJobEntity | null>;

  /**
   * Move the job to `to` only if its current status is one of `allowedFrom`.
   * Returns the updated entity, or null when the job is missing or in another status.
   */
  transition(
    jobId: string,
    allowedFrom: ReadonlyArray<JobStatus>,
    to: JobStatus,
    changes?: ExportJobChanges,
  ): Promise<ExportJobEntity | null>;

  /**
   * Flag a RUNNING job for cooperative cancellation.
   * Returns false when the job is not running.
   */
  requestCancellation(jobId: string): Promise<boolean>;

  isCancellationRequested(jobId: string): Promise<boolean>;

  /**
   * Store a non-terminal notification update (progress)
   */
  updateNotification(jobId: string, notification: ExportPushNotification): Promise<void>;
}
