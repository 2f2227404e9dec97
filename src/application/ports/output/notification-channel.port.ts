import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';

/**
 * Notification Channel Port (Driven Port)
 * Delivers job status updates to the user who started the export.
 * Callers await each send so updates of one job leave in order.
 */
export interface NotificationChannelPort {
  send(notification: ExportPushNotification): Promise<void>;
}
