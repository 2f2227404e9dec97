import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from '@nestjs/common';
import { LoggingNotificationChannelAdapter } from '../../../src/infrastructure/adapters/notifications/logging-notification-channel.adapter';
import { ConsoleEventPublisherAdapter } from '../../../src/infrastructure/adapters/events/console-event-publisher.adapter';
import { JobQueuedEvent } from '../../../src/domain/events/job-queued.event';
import { ExportPushNotification } from '../../../src/domain/entities/export-notification.entity';
import { createQueuedJob } from '../helpers/export-fixtures';

describe('Logging adapters', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const queuedEvent = () =>
    new JobQueuedEvent({
      jobId: 'job-1',
      exportTypeName: 'Catalog.Product',
      userName: 'alice',
      providerName: 'JsonExportProvider',
    });

  describe('LoggingNotificationChannelAdapter', () => {
    it('should log the notification with its progress', async () => {
      const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
      const notification = ExportPushNotification.progressed(
        ExportPushNotification.started(createQueuedJob().notification),
        50,
        250,
      );

      await new LoggingNotificationChannelAdapter().send(notification);

      expect(log).toHaveBeenCalledWith(
        '[NOTIFY] alice job-1 RUNNING: 50 of 250 records exported (50/250)',
      );
    });
  });

  describe('ConsoleEventPublisherAdapter', () => {
    it('should log the event name and its JSON form', async () => {
      const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
      const event = queuedEvent();

      await new ConsoleEventPublisherAdapter().publish(event);

      expect(log).toHaveBeenCalledWith(
        `[EVENT] export.job.queued ${JSON.stringify(event.toJSON())}`,
      );
    });

    it('should log failures of fire-and-forget publishes', async () => {
      const logError = vi.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const publisher = new ConsoleEventPublisherAdapter();
      const failure = new Error('sink unavailable');
      vi.spyOn(publisher, 'publish').mockRejectedValue(failure);

      publisher.publishAsync(queuedEvent());

      await vi.waitFor(() =>
        expect(logError).toHaveBeenCalledWith(
          'Failed to publish event export.job.queued:',
          failure,
        ),
      );
    });
  });
});
