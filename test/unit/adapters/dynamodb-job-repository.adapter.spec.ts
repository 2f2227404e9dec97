import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DynamoDbJobRepositoryAdapter } from '../../../src/infrastructure/adapters/persistence/dynamodb-job-repository.adapter';
import { DynamoDbService } from '../../../src/shared/aws/dynamodb/dynamodb.service';
import { ExportPushNotification } from '../../../src/domain/entities/export-notification.entity';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { InvalidJobTransitionError } from '../../../src/domain/errors/export.errors';
import { createConfigService } from '../helpers/mock-factories';
import { createQueuedJob, createRunningJob } from '../helpers/export-fixtures';

describe('DynamoDbJobRepositoryAdapter', () => {
  let adapter: DynamoDbJobRepositoryAdapter;
  let dynamoDb: DynamoDbService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-01-01T00:00:00.000Z'));

    const configService = createConfigService({ dynamodb: { jobTtlDays: 7 } });
    dynamoDb = new DynamoDbService(configService);
    adapter = new DynamoDbJobRepositoryAdapter(dynamoDb, configService);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('save', () => {
    it('should put the job with a TTL of jobTtlDays', async () => {
      const putJob = vi.spyOn(dynamoDb, 'putJob').mockResolvedValue(true);
      const job = createQueuedJob();

      await adapter.save(job);

      expect(putJob).toHaveBeenCalledWith({ ...job, ttl: 1735689600 + 7 * 86400 });
    });

    it('should refuse to overwrite an existing job', async () => {
      vi.spyOn(dynamoDb, 'putJob').mockResolvedValue(false);

      await expect(adapter.save(createQueuedJob())).rejects.toThrow('Job job-1 already exists');
    });
  });

  describe('findById', () => {
    it('should return null when the item does not exist', async () => {
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue(null);

      await expect(adapter.findById('job-1')).resolves.toBeNull();
    });

    it('should map the stored item back to an entity without the TTL', async () => {
      const job = createRunningJob();
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue({ ...job, ttl: 1736294400 });

      await expect(adapter.findById('job-1')).resolves.toEqual(job);
    });

    it('should default cancellationRequested for older items', async () => {
      const { cancellationRequested: _omitted, ...item } = createQueuedJob();
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue(item);

      const job = await adapter.findById('job-1');

      expect(job?.cancellationRequested).toBe(false);
    });

    it('should reject items that are not jobs', async () => {
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue({ jobId: 'job-1', status: 'PENDING' });

      await expect(adapter.findById('job-1')).rejects.toThrow();
    });
  });

  describe('transition', () => {
    it('should update status and changes conditionally on the allowed statuses', async () => {
      const running = createRunningJob();
      const updateJob = vi.spyOn(dynamoDb, 'updateJob').mockResolvedValue({ ...running });

      const result = await adapter.transition('job-1', [JobStatus.QUEUED], JobStatus.RUNNING, {
        notification: running.notification,
      });

      expect(updateJob).toHaveBeenCalledWith(
        'job-1',
        {
          status: JobStatus.RUNNING,
          updatedAt: '2025-01-01T00:00:00.000Z',
          notification: running.notification,
          fileName: undefined,
          errorMessage: undefined,
        },
        { attribute: 'status', anyOf: [JobStatus.QUEUED] },
      );
      expect(result).toEqual(running);
    });

    it('should return null when the condition fails', async () => {
      vi.spyOn(dynamoDb, 'updateJob').mockResolvedValue(null);

      await expect(
        adapter.transition('job-1', [JobStatus.RUNNING], JobStatus.COMPLETED),
      ).resolves.toBeNull();
    });

    it('should refuse transitions the state machine does not allow', async () => {
      const updateJob = vi.spyOn(dynamoDb, 'updateJob');

      await expect(
        adapter.transition('job-1', [JobStatus.QUEUED, JobStatus.COMPLETED], JobStatus.RUNNING),
      ).rejects.toThrow(InvalidJobTransitionError);
      expect(updateJob).not.toHaveBeenCalled();
    });
  });

  describe('cancellation flag', () => {
    it('should only flag RUNNING jobs', async () => {
      const updateJob = vi.spyOn(dynamoDb, 'updateJob').mockResolvedValue({ ...createRunningJob() });

      await expect(adapter.requestCancellation('job-1')).resolves.toBe(true);
      expect(updateJob).toHaveBeenCalledWith(
        'job-1',
        { cancellationRequested: true, updatedAt: '2025-01-01T00:00:00.000Z' },
        { attribute: 'status', anyOf: [JobStatus.RUNNING] },
      );
    });

    it('should report false when the job is not running', async () => {
      vi.spyOn(dynamoDb, 'updateJob').mockResolvedValue(null);

      await expect(adapter.requestCancellation('job-1')).resolves.toBe(false);
    });

    it('should read the flag from the stored item', async () => {
      vi.spyOn(dynamoDb, 'getJob')
        .mockResolvedValueOnce({ jobId: 'job-1', cancellationRequested: true })
        .mockResolvedValueOnce({ jobId: 'job-1' })
        .mockResolvedValueOnce(null);

      await expect(adapter.isCancellationRequested('job-1')).resolves.toBe(true);
      await expect(adapter.isCancellationRequested('job-1')).resolves.toBe(false);
      await expect(adapter.isCancellationRequested('job-1')).resolves.toBe(false);
    });
  });

  describe('updateNotification', () => {
    it('should only touch unfinished jobs', async () => {
      const updateJob = vi.spyOn(dynamoDb, 'updateJob').mockResolvedValue(null);
      const notification = ExportPushNotification.progressed(
        createRunningJob().notification,
        50,
        100,
      );

      await adapter.updateNotification('job-1', notification);

      expect(updateJob).toHaveBeenCalledWith(
        'job-1',
        { notification, updatedAt: '2025-01-01T00:00:00.000Z' },
        { attribute: 'status', anyOf: [JobStatus.QUEUED, JobStatus.RUNNING] },
      );
    });
  });
});
