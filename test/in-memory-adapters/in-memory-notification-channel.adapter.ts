import { Injectable } from '@nestjs/common';
import { NotificationChannelPort } from '../../src/application/ports/output/notification-channel.port';
import { ExportPushNotification } from '../../src/domain/entities/export-notification.entity';
import { JobStatus } from '../../src/domain/value-objects/job-status.vo';

/**
 * In-Memory Notification Channel Adapter
 * Records every notification in the order it was sent
 */
@Injectable()
export class InMemoryNotificationChannelAdapter implements NotificationChannelPort {
  private sent: ExportPushNotification[] = [];

  async send(notification: ExportPushNotification): Promise<void> {
    this.sent.push(notification);
  }

  // Test helper methods

  getSent(jobId?: string): ExportPushNotification[] {
    return jobId ? this.sent.filter((n) => n.jobId === jobId) : [...this.sent];
  }

  getStatuses(jobId?: string): JobStatus[] {
    return this.getSent(jobId).map((n) => n.status);
  }

  getLast(): ExportPushNotification | undefined {
    return this.sent[this.sent.length - 1];
  }

  clear(): void {
    this.sent = [];
  }
}
