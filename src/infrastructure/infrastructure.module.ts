import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

// Shared services
import { S3Module } from '../shared/aws/s3/s3.module';
import { S3Service } from '../shared/aws/s3/s3.service';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { AppConfig } from '../config/configuration';

import {
  EVENT_PUBLISHER_PORT,
  EXPORT_FILE_STORAGE_PORT,
  JOB_QUEUE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  NOTIFICATION_CHANNEL_PORT,
} from '../application/ports/output/injection-tokens';
import { ExportFileStoragePort } from '../application/ports/output/export-file-storage.port';

// Adapters (implementations)
import { DynamoDbJobRepositoryAdapter } from './adapters/persistence/dynamodb-job-repository.adapter';
import { SqsJobQueueAdapter } from './adapters/queue/sqs-job-queue.adapter';
import { LocalExportFileStorageAdapter } from './adapters/storage/local-export-file-storage.adapter';
import { S3ExportFileStorageAdapter } from './adapters/storage/s3-export-file-storage.adapter';
import { LoggingNotificationChannelAdapter } from './adapters/notifications/logging-notification-channel.adapter';
import { ConsoleEventPublisherAdapter } from './adapters/events/console-event-publisher.adapter';

export function createExportFileStorage(
  configService: ConfigService<AppConfig>,
  s3Service: S3Service,
): ExportFileStoragePort {
  const storage = configService.getOrThrow('storage', { infer: true });
  return storage.driver === 's3'
    ? new S3ExportFileStorageAdapter(s3Service)
    : new LocalExportFileStorageAdapter(storage.root);
}

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * The SQS producer used by the job queue comes from the global SqsModule
 * registered in AppModule.
 */
@Module({
  imports: [S3Module, DynamoDbModule],
  providers: [
    // Persistence adapters
    DynamoDbJobRepositoryAdapter,
    {
      provide: JOB_STATE_REPOSITORY_PORT,
      useExisting: DynamoDbJobRepositoryAdapter,
    },

    // Messaging adapters
    SqsJobQueueAdapter,
    {
      provide: JOB_QUEUE_PORT,
      useExisting: SqsJobQueueAdapter,
    },

    // Storage adapter, chosen by EXPORT_STORAGE_DRIVER
    {
      provide: EXPORT_FILE_STORAGE_PORT,
      inject: [ConfigService, S3Service],
      useFactory: createExportFileStorage,
    },

    // Notifications and events
    LoggingNotificationChannelAdapter,
    {
      provide: NOTIFICATION_CHANNEL_PORT,
      useExisting: LoggingNotificationChannelAdapter,
    },
    ConsoleEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useExisting: ConsoleEventPublisherAdapter,
    },
  ],
  exports: [
    JOB_STATE_REPOSITORY_PORT,
    JOB_QUEUE_PORT,
    EXPORT_FILE_STORAGE_PORT,
    NOTIFICATION_CHANNEL_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
