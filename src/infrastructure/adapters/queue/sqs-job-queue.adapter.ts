import { Injectable, Logger } from '@nestjs/common';
import { SqsService } from '@ssut/nestjs-sqs';
import {
  ExportJobMessage,
  JobQueuePort,
} from '../../../application/ports/output/job-queue.port';
import { ExportJobEntity } from '../../../domain/entities/export-job.entity';

export const EXPORT_JOBS_PRODUCER = 'export-jobs-producer';

/**
 * SQS Job Queue Adapter
 * Implements JobQueuePort using @ssut/nestjs-sqs producers
 */
@Injectable()
export class SqsJobQueueAdapter implements JobQueuePort {
  private readonly logger = new Logger(SqsJobQueueAdapter.name);

  constructor(private readonly sqsService: SqsService) {}

  async enqueue(job: ExportJobEntity): Promise<string> {
    const message: ExportJobMessage = {
      jobId: job.jobId,
      exportTypeName: job.request.exportTypeName,
      enqueuedAt: new Date().toISOString(),
    };

    const result = await this.sqsService.send<ExportJobMessage>(EXPORT_JOBS_PRODUCER, {
      id: job.jobId,
      body: message,
    });

    this.logger.debug(`Enqueued job ${job.jobId} as SQS message ${result[0]?.MessageId ?? '?'}`);
    return job.jobId;
  }

  /**
   * SQS cannot delete a message that has not been received. The entry stays
   * on the queue and the consumer drops it because the job is no longer QUEUED.
   */
  async remove(jobId: string): Promise<void> {
    this.logger.debug(`Queue entry of job ${jobId} left for the consumer to drop`);
  }
}
