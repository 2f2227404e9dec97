import { Injectable } from '@nestjs/common';
import { SqsMessageHandler } from '@ssut/nestjs-sqs';
import { Message } from '@aws-sdk/client-sqs';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { ExecuteExportJobUseCase } from '../../application/use-cases/execute-export-job.use-case';
import { ExportJobMessageSchema } from '../dto/export-job.dto';

export const EXPORT_JOBS_QUEUE = 'export-jobs-queue';

/**
 * Export Job Consumer
 * Listens to export-jobs-queue and runs each queued export to completion
 * Uses @ssut/nestjs-sqs for message consumption
 */
@Injectable()
export class ExportJobConsumer {
  constructor(
    private readonly logger: PinoLoggerService,
    private readonly executeExportJob: ExecuteExportJobUseCase,
  ) {
    this.logger.setContext(ExportJobConsumer.name);
  }

  @SqsMessageHandler(EXPORT_JOBS_QUEUE, false)
  async handleMessage(message: Message): Promise<void> {
    const messageId = message.MessageId || 'unknown';

    // Parse message body
    let body: unknown;
    try {
      body = JSON.parse(message.Body || '{}');
    } catch (error) {
      this.logger.error({ messageId, error: String(error) }, 'Failed to parse message body');
      // Return without throwing to delete invalid message
      return;
    }

    const parsed = ExportJobMessageSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error({ messageId, error: parsed.error.message }, 'Invalid export job message');
      return;
    }

    const { jobId, exportTypeName } = parsed.data;
    const jobLogger = this.logger.withJobId(jobId);

    jobLogger.info({ exportTypeName, messageId }, 'Processing export job');

    // Job-level failures are recorded on the job; anything thrown here is an
    // infrastructure failure and leaves the message for SQS to redeliver
    const result = await this.executeExportJob.execute({ jobId });

    jobLogger.info({ outcome: result.outcome }, 'Export job message handled');
  }
}
