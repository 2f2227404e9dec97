import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ExecuteExportJobCommand,
  ExecuteExportJobOutcome,
  ExecuteExportJobPort,
} from '../ports/input/execute-export-job.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import {
  ExportFileStoragePort,
  ExportFileWriter,
} from '../ports/output/export-file-storage.port';
import { NotificationChannelPort } from '../ports/output/notification-channel.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  EXPORT_FILE_STORAGE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  NOTIFICATION_CHANNEL_PORT,
} from '../ports/output/injection-tokens';
import { KnownExportTypesRegistry } from '../registry/known-export-types.registry';
import { ExportProviderRegistry } from '../providers/export-provider.registry';
import { JobCancellationToken } from '../cancellation/job-cancellation-token';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { ExportPushNotification } from '../../domain/entities/export-notification.entity';
import { ExportFileNameVO } from '../../domain/value-objects/export-file-name.vo';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { PagedDataSource } from '../../domain/model/paged-data-source';
import { DataSourceError, ExportCancelledError } from '../../domain/errors/export.errors';
import { JobStartedEvent } from '../../domain/events/job-started.event';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobFailedEvent } from '../../domain/events/job-failed.event';
import { JobCancelledEvent } from '../../domain/events/job-cancelled.event';
import { AppConfig } from '../../config/configuration';

/**
 * Execute Export Job Use Case
 *
 * Runs one queued job to a terminal state:
 * claim (QUEUED → RUNNING) → page through the data source → write through the
 * provider into a storage writer → publish the file → COMPLETED.
 *
 * Every terminal transition is compare-and-set, so exactly one terminal
 * notification leaves per job even when a cancel races the worker.
 */
@Injectable()
export class ExecuteExportJobUseCase implements ExecuteExportJobPort {
  private readonly logger = new Logger(ExecuteExportJobUseCase.name);
  private readonly downloadBasePath: string;

  constructor(
    private readonly registry: KnownExportTypesRegistry,
    private readonly providers: ExportProviderRegistry,
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(EXPORT_FILE_STORAGE_PORT)
    private readonly storage: ExportFileStoragePort,
    @Inject(NOTIFICATION_CHANNEL_PORT)
    private readonly notifications: NotificationChannelPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    configService: ConfigService<AppConfig>,
  ) {
    this.downloadBasePath = configService.getOrThrow('storage', { infer: true }).downloadBasePath;
  }

  async execute(command: ExecuteExportJobCommand): Promise<ExecuteExportJobOutcome> {
    const { jobId } = command;

    const existing = await this.jobRepository.findById(jobId);
    if (!existing) {
      this.logger.warn(`Export job ${jobId} no longer exists, dropping`);
      return { outcome: 'skipped', jobId };
    }

    const claimed = await this.jobRepository.transition(
      jobId,
      [JobStatus.QUEUED],
      JobStatus.RUNNING,
      { notification: ExportPushNotification.started(existing.notification) },
    );
    if (!claimed) {
      this.logger.log(`Export job ${jobId} is ${existing.status}, not claiming`);
      return { outcome: 'skipped', jobId, status: existing.status };
    }

    this.logger.log(`Running export job ${jobId} (${claimed.request.exportTypeName})`);
    try {
      await this.notifications.send(claimed.notification);
      this.eventPublisher.publishAsync(
        new JobStartedEvent({
          jobId,
          exportTypeName: claimed.request.exportTypeName,
          userName: claimed.userName,
        }),
      );
    } catch (error) {
      return this.fail(claimed, claimed.notification, error);
    }

    return this.run(claimed);
  }

  private async run(job: ExportJobEntity): Promise<ExecuteExportJobOutcome> {
    const startTime = Date.now();
    const token = new JobCancellationToken(job.jobId, this.jobRepository);
    const { request } = job;

    let notification = job.notification;
    let exportedCount = 0;
    let writer: ExportFileWriter | undefined;

    try {
      const definition = this.registry.resolve(request.exportTypeName);
      const provider = this.providers.create(request);
      const dataSource = this.createDataSource(request.exportTypeName, () =>
        definition.dataSourceFactory(request.dataQuery),
      );

      const fileName = ExportFileNameVO.forJob(
        ExportPushNotification.titleFor(request.exportTypeName),
        job.jobId,
        provider.exportedFileExtension,
      ).value;

      if (await this.storage.exists(fileName)) {
        throw new Error(`Export file ${fileName} is already published`);
      }

      const totalCount = await dataSource.getTotalCount();
      writer = await this.storage.openWrite(fileName);
      const recordWriter = provider.open(writer.stream);

      for (;;) {
        await token.throwIfCancellationRequested();

        const page = await dataSource.fetchPage();
        if (page.length === 0) {
          break;
        }

        await recordWriter.writeRecords(page);
        exportedCount += page.length;

        notification = ExportPushNotification.progressed(
          notification,
          exportedCount,
          Math.max(totalCount, exportedCount),
        );
        await this.jobRepository.updateNotification(job.jobId, notification);
        await this.notifications.send(notification);
      }

      await recordWriter.finish();
      await writer.commit();
      writer = undefined;

      return await this.complete(job, notification, fileName, exportedCount, startTime);
    } catch (error) {
      if (writer) {
        await this.discard(writer);
      }

      if (error instanceof ExportCancelledError) {
        return this.cancel(job, notification, exportedCount);
      }
      return this.fail(job, notification, error);
    }
  }

  private createDataSource(
    typeName: string,
    factory: () => PagedDataSource,
  ): PagedDataSource {
    try {
      return factory();
    } catch (error) {
      throw DataSourceError.wrap(typeName, error);
    }
  }

  private async complete(
    job: ExportJobEntity,
    notification: ExportPushNotification,
    fileName: string,
    exportedCount: number,
    startTime: number,
  ): Promise<ExecuteExportJobOutcome> {
    const downloadUrl = `${this.downloadBasePath}/${encodeURIComponent(fileName)}`;
    const completedNotification = ExportPushNotification.completed(
      notification,
      fileName,
      downloadUrl,
    );

    const completed = await this.jobRepository.transition(
      job.jobId,
      [JobStatus.RUNNING],
      JobStatus.COMPLETED,
      { notification: completedNotification, fileName },
    );

    if (!completed) {
      this.logger.error(`Export job ${job.jobId} left RUNNING before it could complete`);
      await this.unpublish(fileName);
      return { outcome: 'failed', jobId: job.jobId, errorMessage: 'Job state changed during export' };
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Export job ${job.jobId} completed: ${exportedCount} records in ${durationMs}ms → ${fileName}`,
    );

    await this.notifications.send(completedNotification);
    this.eventPublisher.publishAsync(
      new JobCompletedEvent({
        jobId: job.jobId,
        exportTypeName: job.request.exportTypeName,
        userName: job.userName,
        fileName,
        exportedCount,
        durationMs,
      }),
    );

    return { outcome: 'completed', jobId: job.jobId, fileName, exportedCount };
  }

  private async cancel(
    job: ExportJobEntity,
    notification: ExportPushNotification,
    exportedCount: number,
  ): Promise<ExecuteExportJobOutcome> {
    this.logger.log(`Export job ${job.jobId} cancelled after ${exportedCount} records`);

    try {
      const cancelledNotification = ExportPushNotification.cancelled(notification);
      const cancelled = await this.jobRepository.transition(
        job.jobId,
        [JobStatus.RUNNING],
        JobStatus.CANCELLED,
        { notification: cancelledNotification },
      );

      if (cancelled) {
        await this.notifications.send(cancelledNotification);
        this.eventPublisher.publishAsync(
          new JobCancelledEvent({
            jobId: job.jobId,
            exportTypeName: job.request.exportTypeName,
            userName: job.userName,
            wasRunning: true,
          }),
        );
      }
    } catch (error) {
      this.logger.error(`Failed to record cancellation of ${job.jobId}:`, error);
    }

    return { outcome: 'cancelled', jobId: job.jobId, exportedCount };
  }

  private async fail(
    job: ExportJobEntity,
    notification: ExportPushNotification,
    error: unknown,
  ): Promise<ExecuteExportJobOutcome> {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(`Export job ${job.jobId} failed: ${errorMessage}`, error);

    try {
      const failedNotification = ExportPushNotification.failed(notification, errorMessage);
      const failed = await this.jobRepository.transition(
        job.jobId,
        [JobStatus.RUNNING],
        JobStatus.FAILED,
        { notification: failedNotification, errorMessage },
      );

      if (failed) {
        await this.notifications.send(failedNotification);
        this.eventPublisher.publishAsync(
          new JobFailedEvent({
            jobId: job.jobId,
            exportTypeName: job.request.exportTypeName,
            userName: job.userName,
            errorMessage,
            failureReason: error instanceof DataSourceError ? 'data_source_error' : 'execution_error',
          }),
        );
      }
    } catch (repoError) {
      this.logger.error(`Failed to record failure of ${job.jobId}:`, repoError);
    }

    return { outcome: 'failed', jobId: job.jobId, errorMessage };
  }

  private async unpublish(fileName: string): Promise<void> {
    try {
      await this.storage.delete(fileName);
    } catch (error) {
      this.logger.warn(`Failed to delete orphaned file ${fileName}: ${String(error)}`);
    }
  }

  private async discard(writer: ExportFileWriter): Promise<void> {
    try {
      await writer.abort();
    } catch (error) {
      this.logger.warn(`Failed to discard partial file ${writer.fileName}: ${String(error)}`);
    }
  }
}
