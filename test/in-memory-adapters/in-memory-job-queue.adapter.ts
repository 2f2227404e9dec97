import { Injectable } from '@nestjs/common';
import { ExportJobMessage, JobQueuePort } from '../../src/application/ports/output/job-queue.port';
import { ExportJobEntity } from '../../src/domain/entities/export-job.entity';

/**
 * In-Memory Job Queue Adapter
 * FIFO of job messages; tests drain it by hand to play the worker
 */
@Injectable()
export class InMemoryJobQueueAdapter implements JobQueuePort {
  private messages: ExportJobMessage[] = [];
  private failure?: Error;

  async enqueue(job: ExportJobEntity): Promise<string> {
    if (this.failure) {
      throw this.failure;
    }

    this.messages.push({
      jobId: job.jobId,
      exportTypeName: job.request.exportTypeName,
      enqueuedAt: new Date().toISOString(),
    });
    return job.jobId;
  }

  async remove(jobId: string): Promise<void> {
    this.messages = this.messages.filter((message) => message.jobId !== jobId);
  }

  // Test helper methods

  /**
   * Makes every following enqueue reject with `error`
   */
  failWith(error: Error): void {
    this.failure = error;
  }

  dequeue(): ExportJobMessage | undefined {
    return this.messages.shift();
  }

  getMessages(): ExportJobMessage[] {
    return [...this.messages];
  }

  getQueueLength(): number {
    return this.messages.length;
  }

  clear(): void {
    this.messages = [];
    this.failure = undefined;
  }
}
