import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JobStateRepositoryPort } from '../../../application/ports/output/job-state-repository.port';
import { ExportJobChanges, ExportJobEntity } from '../../../domain/entities/export-job.entity';
import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';
import { JobStatus, JobStatusVO } from '../../../domain/value-objects/job-status.vo';
import { InvalidJobTransitionError } from '../../../domain/errors/export.errors';
import { DynamoDbService } from '../../../shared/aws/dynamodb/dynamodb.service';
import { AppConfig } from '../../../config/configuration';
import { toJobEntity } from './job-record.schema';

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * DynamoDB Job Repository Adapter
 * Implements JobStateRepositoryPort using DynamoDB conditional writes
 */
@Injectable()
export class DynamoDbJobRepositoryAdapter implements JobStateRepositoryPort {
  private readonly logger = new Logger(DynamoDbJobRepositoryAdapter.name);
  private readonly ttlDays: number;

  constructor(
    private readonly dynamoDb: DynamoDbService,
    configService: ConfigService<AppConfig>,
  ) {
    this.ttlDays = configService.getOrThrow('dynamodb', { infer: true }).jobTtlDays;
  }

  async save(job: ExportJobEntity): Promise<void> {
    const created = await this.dynamoDb.putJob({
      ...job,
      ttl: Math.floor(Date.now() / 1000) + this.ttlDays * SECONDS_PER_DAY,
    });
    if (!created) {
      throw new Error(`Job ${job.jobId} already exists`);
    }

    this.logger.log(`Saved job ${job.jobId} to DynamoDB`);
  }

  async findById(jobId: string): Promise<ExportJobEntity | null> {
    const item = await this.dynamoDb.getJob(jobId);
    return item ? toJobEntity(item) : null;
  }

  async transition(
    jobId: string,
    allowedFrom: ReadonlyArray<JobStatus>,
    to: JobStatus,
    changes: ExportJobChanges = {},
  ): Promise<ExportJobEntity | null> {
    const target = JobStatusVO.of(to);
    for (const from of allowedFrom) {
      if (!JobStatusVO.of(from).canTransitionTo(target)) {
        throw new InvalidJobTransitionError(from, to);
      }
    }

    const item = await this.dynamoDb.updateJob(
      jobId,
      {
        status: to,
        updatedAt: new Date().toISOString(),
        notification: changes.notification,
        fileName: changes.fileName,
        errorMessage: changes.errorMessage,
      },
      { attribute: 'status', anyOf: allowedFrom },
    );

    if (!item) {
      this.logger.debug(`Job ${jobId} not in [${allowedFrom.join(', ')}], ${to} rejected`);
      return null;
    }

    this.logger.debug(`Job ${jobId} moved to ${to}`);
    return toJobEntity(item);
  }

  async requestCancellation(jobId: string): Promise<boolean> {
    const item = await this.dynamoDb.updateJob(
      jobId,
      { cancellationRequested: true, updatedAt: new Date().toISOString() },
      { attribute: 'status', anyOf: [JobStatus.RUNNING] },
    );
    return item !== null;
  }

  async isCancellationRequested(jobId: string): Promise<boolean> {
    const item = await this.dynamoDb.getJob(jobId);
    return item?.cancellationRequested === true;
  }

  async updateNotification(jobId: string, notification: ExportPushNotification): Promise<void> {
    const item = await this.dynamoDb.updateJob(
      jobId,
      { notification, updatedAt: new Date().toISOString() },
      { attribute: 'status', anyOf: [JobStatus.QUEUED, JobStatus.RUNNING] },
    );

    if (!item) {
      this.logger.debug(`Skipped notification update for finished job ${jobId}`);
    }
  }
}
