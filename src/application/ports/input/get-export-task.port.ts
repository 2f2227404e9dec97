import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';

export interface GetExportTaskCommand {
  jobId: string;
}

/**
 * Get Export Task Port (Driving Port / Use Case Interface)
 * Latest notification of a job, for clients polling instead of listening
 */
export interface GetExportTaskPort {
  execute(command: GetExportTaskCommand): Promise<ExportPushNotification>;
}
