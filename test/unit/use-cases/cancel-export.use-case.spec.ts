import { describe, it, expect, beforeEach } from 'vitest';
import { CancelExportUseCase } from '../../../src/application/use-cases/cancel-export.use-case';
import { ExportJobEntity } from '../../../src/domain/entities/export-job.entity';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { JobCancelledEvent } from '../../../src/domain/events/job-cancelled.event';
import {
  InMemoryEventPublisherAdapter,
  InMemoryJobQueueAdapter,
  InMemoryJobRepositoryAdapter,
  InMemoryNotificationChannelAdapter,
} from '../../in-memory-adapters';
import {
  createMockEventPublisher,
  createMockJobQueue,
  createMockJobRepository,
  createMockNotificationChannel,
} from '../helpers/mock-factories';
import { createQueuedJob, createRunningJob } from '../helpers/export-fixtures';

describe('CancelExportUseCase', () => {
  describe('with in-memory adapters', () => {
    let useCase: CancelExportUseCase;
    let repository: InMemoryJobRepositoryAdapter;
    let queue: InMemoryJobQueueAdapter;
    let notifications: InMemoryNotificationChannelAdapter;
    let events: InMemoryEventPublisherAdapter;

    beforeEach(() => {
      repository = new InMemoryJobRepositoryAdapter();
      queue = new InMemoryJobQueueAdapter();
      notifications = new InMemoryNotificationChannelAdapter();
      events = new InMemoryEventPublisherAdapter();
      useCase = new CancelExportUseCase(repository, queue, notifications, events);
    });

    it('should ignore unknown jobs', async () => {
      await expect(useCase.execute({ jobId: 'missing' })).resolves.toEqual({
        jobId: 'missing',
        accepted: false,
      });
    });

    it('should cancel a queued job immediately', async () => {
      const job = createQueuedJob();
      await repository.save(job);
      await queue.enqueue(job);

      const result = await useCase.execute({ jobId: 'job-1' });

      expect(result).toEqual({ jobId: 'job-1', accepted: true, status: JobStatus.CANCELLED });
      expect((await repository.findById('job-1'))?.status).toBe(JobStatus.CANCELLED);
      expect(queue.getQueueLength()).toBe(0);
    });

    it('should send the cancelled notification and event for a queued job', async () => {
      await repository.save(createQueuedJob());

      await useCase.execute({ jobId: 'job-1' });

      expect(notifications.getSent()).toHaveLength(1);
      expect(notifications.getLast()).toMatchObject({
        id: 'notification-job-1',
        status: JobStatus.CANCELLED,
        description: 'Export was cancelled by the user',
      });
      const [event] = events.getEventsOfType(JobCancelledEvent);
      expect(event.payload).toEqual({
        jobId: 'job-1',
        exportTypeName: 'Catalog.Product',
        userName: 'alice',
        wasRunning: false,
      });
    });

    it('should only flag a running job', async () => {
      await repository.save(createRunningJob());

      const result = await useCase.execute({ jobId: 'job-1' });

      expect(result).toEqual({ jobId: 'job-1', accepted: true, status: JobStatus.RUNNING });
      const job = await repository.findById('job-1');
      expect(job?.status).toBe(JobStatus.RUNNING);
      expect(job?.cancellationRequested).toBe(true);
      expect(notifications.getSent()).toEqual([]);
    });

    it.each([JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.CANCELLED])(
      'should leave a %s job alone',
      async (status) => {
        const running = createRunningJob();
        await repository.save(
          status === JobStatus.CANCELLED
            ? ExportJobEntity.transitionTo(createQueuedJob(), status)
            : ExportJobEntity.transitionTo(running, status),
        );

        const result = await useCase.execute({ jobId: 'job-1' });

        expect(result).toEqual({ jobId: 'job-1', accepted: false, status });
        expect(notifications.getSent()).toEqual([]);
      },
    );

    it('should be idempotent', async () => {
      await repository.save(createQueuedJob());

      await useCase.execute({ jobId: 'job-1' });
      const second = await useCase.execute({ jobId: 'job-1' });

      expect(second).toEqual({ jobId: 'job-1', accepted: false, status: JobStatus.CANCELLED });
      expect(notifications.getSent()).toHaveLength(1);
    });
  });

  describe('with mocked ports', () => {
    let repository: ReturnType<typeof createMockJobRepository>;
    let queue: ReturnType<typeof createMockJobQueue>;
    let notifications: ReturnType<typeof createMockNotificationChannel>;
    let useCase: CancelExportUseCase;

    beforeEach(() => {
      repository = createMockJobRepository();
      queue = createMockJobQueue();
      notifications = createMockNotificationChannel();
      useCase = new CancelExportUseCase(
        repository,
        queue,
        notifications,
        createMockEventPublisher(),
      );
    });

    it('should still cancel when the queue entry cannot be removed', async () => {
      const queued = createQueuedJob();
      repository.findById.mockResolvedValue(queued);
      repository.transition.mockResolvedValue(
        ExportJobEntity.transitionTo(queued, JobStatus.CANCELLED),
      );
      queue.remove.mockRejectedValue(new Error('queue unavailable'));

      const result = await useCase.execute({ jobId: 'job-1' });

      expect(result).toEqual({ jobId: 'job-1', accepted: true, status: JobStatus.CANCELLED });
      expect(notifications.send).toHaveBeenCalledTimes(1);
    });

    it('should flag the job when a worker claimed it after it was read', async () => {
      repository.findById.mockResolvedValue(createQueuedJob());
      repository.transition.mockResolvedValue(null);
      repository.requestCancellation.mockResolvedValue(true);

      const result = await useCase.execute({ jobId: 'job-1' });

      expect(result).toEqual({ jobId: 'job-1', accepted: true, status: JobStatus.RUNNING });
      expect(queue.remove).not.toHaveBeenCalled();
    });

    it('should report the current status when the job finished in the meantime', async () => {
      const running = createRunningJob();
      repository.findById
        .mockResolvedValueOnce(running)
        .mockResolvedValueOnce(ExportJobEntity.transitionTo(running, JobStatus.COMPLETED));
      repository.requestCancellation.mockResolvedValue(false);

      const result = await useCase.execute({ jobId: 'job-1' });

      expect(result).toEqual({ jobId: 'job-1', accepted: false, status: JobStatus.COMPLETED });
      expect(repository.transition).not.toHaveBeenCalled();
    });
  });
});
