import { describe, it, expect, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { HealthCheckError } from '@nestjs/terminus';
import { DiskSpaceHealthIndicator } from '../../../src/health/indicators/disk-space.health';
import { DynamoDbHealthIndicator } from '../../../src/health/indicators/dynamodb.health';
import { DynamoDbService } from '../../../src/shared/aws/dynamodb/dynamodb.service';
import { createConfigService } from '../helpers/mock-factories';

const statsFs = (bavail: number) => ({
  type: 0,
  bsize: 4096,
  blocks: 100,
  bfree: bavail,
  bavail,
  files: 10,
  ffree: 10,
});

describe('Health indicators', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('DiskSpaceHealthIndicator', () => {
    it('should always be up with the s3 driver', async () => {
      const indicator = new DiskSpaceHealthIndicator(
        createConfigService({ storage: { driver: 's3' } }),
      );

      await expect(indicator.isHealthy('disk_space')).resolves.toEqual({
        disk_space: { status: 'up', driver: 's3' },
      });
    });

    it('should report free space on the local root', async () => {
      vi.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
      vi.spyOn(fs, 'statfs').mockResolvedValue(statsFs(50));
      const indicator = new DiskSpaceHealthIndicator(createConfigService());

      await expect(indicator.isHealthy('disk_space')).resolves.toEqual({
        disk_space: {
          status: 'up',
          path: '/tmp/exports',
          totalBytes: 409600,
          freeBytes: 204800,
          freePercent: 50,
        },
      });
    });

    it('should fail below 10% free', async () => {
      vi.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
      vi.spyOn(fs, 'statfs').mockResolvedValue(statsFs(5));
      const indicator = new DiskSpaceHealthIndicator(createConfigService());

      await expect(indicator.isHealthy('disk_space')).rejects.toThrow('Low disk space: 5.0% free');
    });

    it('should fail when the root cannot be inspected', async () => {
      vi.spyOn(fs, 'mkdir').mockRejectedValue(new Error('read-only file system'));
      const indicator = new DiskSpaceHealthIndicator(createConfigService());

      const error = await indicator.isHealthy('disk_space').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HealthCheckError);
      expect(error).toMatchObject({
        message: 'Disk space check failed',
        causes: { disk_space: { status: 'down', error: 'read-only file system' } },
      });
    });
  });

  describe('DynamoDbHealthIndicator', () => {
    const createIndicator = () => {
      const dynamoDb = new DynamoDbService(createConfigService());
      return { dynamoDb, indicator: new DynamoDbHealthIndicator(dynamoDb) };
    };

    it('should be up when the table is active', async () => {
      const { dynamoDb, indicator } = createIndicator();
      vi.spyOn(dynamoDb, 'describeTable').mockResolvedValue({ status: 'ACTIVE', itemCount: 3 });

      await expect(indicator.isHealthy('dynamodb')).resolves.toEqual({
        dynamodb: {
          status: 'up',
          tableName: 'export-jobs-test',
          tableStatus: 'ACTIVE',
          itemCount: 3,
        },
      });
    });

    it('should fail while the table is not active', async () => {
      const { dynamoDb, indicator } = createIndicator();
      vi.spyOn(dynamoDb, 'describeTable').mockResolvedValue({ status: 'CREATING', itemCount: 0 });

      await expect(indicator.isHealthy('dynamodb')).rejects.toThrow(
        'DynamoDB table is not active: CREATING',
      );
    });

    it('should fail when the table cannot be described', async () => {
      const { dynamoDb, indicator } = createIndicator();
      vi.spyOn(dynamoDb, 'describeTable').mockRejectedValue(new Error('unreachable'));

      const error = await indicator.isHealthy('dynamodb').catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: 'DynamoDB health check failed',
        causes: { dynamodb: { status: 'down', error: 'unreachable' } },
      });
    });
  });
});
