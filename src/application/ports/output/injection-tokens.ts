// Injection tokens (string symbols for DI)
export const JOB_STATE_REPOSITORY_PORT = 'JobStateRepositoryPort';
export const JOB_QUEUE_PORT = 'JobQueuePort';
export const EXPORT_FILE_STORAGE_PORT = 'ExportFileStoragePort';
export const NOTIFICATION_CHANNEL_PORT = 'NotificationChannelPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
