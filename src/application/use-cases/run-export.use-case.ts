import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { RunExportCommand, RunExportPort } from '../ports/input/run-export.port';
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
import { ExportAuthorizationService } from '../authorization/export-authorization.service';
import { ExportProviderRegistry } from '../providers/export-provider.registry';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { ExportPushNotification } from '../../domain/entities/export-notification.entity';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobQueuedEvent } from '../../domain/events/job-queued.event';
import { JobFailedEvent } from '../../domain/events/job-failed.event';

/**
 * Run Export Use Case
 *
 * Authorizes the request, records a QUEUED job and hands it to the queue.
 * Returns as soon as the queue accepted the entry; execution happens in
 * ExecuteExportJobUseCase on a worker.
 */
@Injectable()
export class RunExportUseCase implements RunExportPort {
  private readonly logger = new Logger(RunExportUseCase.name);

  constructor(
    private readonly authorization: ExportAuthorizationService,
    private readonly providers: ExportProviderRegistry,
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_QUEUE_PORT)
    private readonly jobQueue: JobQueuePort,
    @Inject(NOTIFICATION_CHANNEL_PORT)
    private readonly notifications: NotificationChannelPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: RunExportCommand): Promise<ExportPushNotification> {
    const { request, principal } = command;

    await this.authorization.ensureAuthorized(principal, request);
    // Fails on an unknown provider before anything is recorded
    const provider = this.providers.create(request);

    const jobId = uuidv4();
    const notification = ExportPushNotification.create({
      id: uuidv4(),
      jobId,
      creator: principal.userName,
      exportTypeName: request.exportTypeName,
    });
    const job = ExportJobEntity.create({
      jobId,
      request,
      userName: principal.userName,
      notification,
    });

    await this.jobRepository.save(job);
    await this.notifications.send(notification);

    try {
      await this.jobQueue.enqueue(job);
    } catch (error) {
      await this.failUnqueuedJob(job, error);
      throw error;
    }

    this.logger.log(`Queued export job ${jobId} for ${request.exportTypeName}`);

    this.eventPublisher.publishAsync(
      new JobQueuedEvent({
        jobId,
        exportTypeName: request.exportTypeName,
        userName: principal.userName,
        providerName: provider.typeName,
      }),
    );

    return notification;
  }

  private async failUnqueuedJob(job: ExportJobEntity, error: unknown): Promise<void> {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(`Failed to enqueue export job ${job.jobId}:`, error);

    try {
      const notification = ExportPushNotification.failed(job.notification, errorMessage);
      const failed = await this.jobRepository.transition(
        job.jobId,
        [JobStatus.QUEUED],
        JobStatus.FAILED,
        { notification, errorMessage },
      );

      if (failed) {
        await this.notifications.send(notification);
        this.eventPublisher.publishAsync(
          new JobFailedEvent({
            jobId: job.jobId,
            exportTypeName: job.request.exportTypeName,
            userName: job.userName,
            errorMessage,
            failureReason: 'enqueue_failed',
          }),
        );
      }
    } catch (repoError) {
      this.logger.error(`Failed to record enqueue failure for ${job.jobId}:`, repoError);
    }
  }
}
