import { Injectable, Logger } from '@nestjs/common';
import { NotificationChannelPort } from '../../../application/ports/output/notification-channel.port';
import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';

/**
 * Notification Channel Adapter
 * Implements NotificationChannelPort by logging every notification
 */
@Injectable()
export class LoggingNotificationChannelAdapter implements NotificationChannelPort {
  private readonly logger = new Logger(LoggingNotificationChannelAdapter.name);

  async send(notification: ExportPushNotification): Promise<void> {
    this.logger.log(
      `[NOTIFY] ${notification.creator} ${notification.jobId} ${notification.status}: ${notification.description} (${notification.processedCount}/${notification.totalCount})`,
    );
  }
}
