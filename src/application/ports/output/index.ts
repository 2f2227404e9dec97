/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { JobStateRepositoryPort } from './job-state-repository.port';
export type { JobQueuePort, ExportJobMessage } from './job-queue.port';
export type {
  ExportFileStoragePort,
  ExportFileWriter,
  StoredFileStream,
} from './export-file-storage.port';
export type { NotificationChannelPort } from './notification-channel.port';
export type { EventPublisherPort } from './event-publisher.port';
export {
  JOB_STATE_REPOSITORY_PORT,
  JOB_QUEUE_PORT,
  EXPORT_FILE_STORAGE_PORT,
  NOTIFICATION_CHANNEL_PORT,
  EVENT_PUBLISHER_PORT,
} from './injection-tokens';
