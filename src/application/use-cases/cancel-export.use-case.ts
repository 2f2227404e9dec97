import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CancelExportCommand,
  CancelExportPort,
  CancelExportResult,
} from '../ports/input/cancel-export.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JobQueuePort } from '../ports/output/job-queue.port';
import { NotificationChannelPort } from '../ports/output/notification-channel.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  JOB_QUEUE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  NOTIFICATION_CHANNEL_PORT,
} from '../ports/output/injection-tokens';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { ExportPushNotification } from '../../domain/entities/export-notification.entity';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobCancelledEvent } from '../../domain/events/job-cancelled.event';

/**
 * Cancel Export Use Case
 *
 * A queued job is cancelled here and now. A running job is only flagged:
 * its worker notices between pages and records the cancellation itself.
 */
@Injectable()
export class CancelExportUseCase implements CancelExportPort {
  private readonly logger = new Logger(CancelExportUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_QUEUE_PORT)
    private readonly jobQueue: JobQueuePort,
    @Inject(NOTIFICATION_CHANNEL_PORT)
    private readonly notifications: NotificationChannelPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: CancelExportCommand): Promise<CancelExportResult> {
    const { jobId } = command;

    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      this.logger.debug(`Cancel requested for unknown job ${jobId}`);
      return { jobId, accepted: false };
    }
    if (ExportJobEntity.isTerminal(job)) {
      this.logger.debug(`Cancel requested for finished job ${jobId} (${job.status})`);
      return { jobId, accepted: false, status: job.status };
    }

    if (job.status === JobStatus.QUEUED && (await this.cancelQueued(job))) {
      return { jobId, accepted: true, status: JobStatus.CANCELLED };
    }

    // Running, or claimed by a worker since we read it
    const flagged = await this.jobRepository.requestCancellation(jobId);
    if (flagged) {
      this.logger.log(`Cancellation requested for running job ${jobId}`);
      return { jobId, accepted: true, status: JobStatus.RUNNING };
    }

    const current = await this.jobRepository.findById(jobId);
    return { jobId, accepted: false, status: current?.status };
  }

  private async cancelQueued(job: ExportJobEntity): Promise<boolean> {
    const notification = ExportPushNotification.cancelled(job.notification);
    const cancelled = await this.jobRepository.transition(
      job.jobId,
      [JobStatus.QUEUED],
      JobStatus.CANCELLED,
      { notification },
    );
    if (!cancelled) {
      return false;
    }

    this.logger.log(`Cancelled queued export job ${job.jobId}`);

    try {
      await this.jobQueue.remove(job.jobId);
    } catch (error) {
      // The worker drops the entry anyway once it sees the job is CANCELLED
      this.logger.warn(`Failed to remove queue entry of ${job.jobId}: ${String(error)}`);
    }

    await this.notifications.send(notification);
    this.eventPublisher.publishAsync(
      new JobCancelledEvent({
        jobId: job.jobId,
        exportTypeName: job.request.exportTypeName,
        userName: job.userName,
        wasRunning: false,
      }),
    );

    return true;
  }
}
