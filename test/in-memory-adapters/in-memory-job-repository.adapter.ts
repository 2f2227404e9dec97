import { Injectable } from '@nestjs/common';
import { JobStateRepositoryPort } from '../../src/application/ports/output/job-state-repository.port';
import { ExportJobChanges, ExportJobEntity } from '../../src/domain/entities/export-job.entity';
import { ExportPushNotification } from '../../src/domain/entities/export-notification.entity';
import { JobStatus } from '../../src/domain/value-objects/job-status.vo';

/**
 * In-Memory Job State Repository Adapter
 * Compare-and-set semantics of the DynamoDB adapter, without DynamoDB
 */
@Injectable()
export class InMemoryJobRepositoryAdapter implements JobStateRepositoryPort {
  private jobs: Map<string, ExportJobEntity> = new Map();

  async save(job: ExportJobEntity): Promise<void> {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`Job ${job.jobId} already exists`);
    }
    this.jobs.set(job.jobId, job);
  }

  async findById(jobId: string): Promise<ExportJobEntity | null> {
    return this.jobs.get(jobId) ?? null;
  }

  async transition(
    jobId: string,
    allowedFrom: ReadonlyArray<JobStatus>,
    to: JobStatus,
    changes: ExportJobChanges = {},
  ): Promise<ExportJobEntity | null> {
    const job = this.jobs.get(jobId);
    if (!job || !allowedFrom.includes(job.status)) {
      return null;
    }

    const updated = ExportJobEntity.transitionTo(job, to, changes);
    this.jobs.set(jobId, updated);
    return updated;
  }

  async requestCancellation(jobId: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== JobStatus.RUNNING) {
      return false;
    }

    this.jobs.set(jobId, ExportJobEntity.withCancellationRequested(job));
    return true;
  }

  async isCancellationRequested(jobId: string): Promise<boolean> {
    return this.jobs.get(jobId)?.cancellationRequested === true;
  }

  async updateNotification(jobId: string, notification: ExportPushNotification): Promise<void> {
    const job = this.jobs.get(jobId);
    if (job && !ExportJobEntity.isTerminal(job)) {
      this.jobs.set(jobId, ExportJobEntity.withNotification(job, notification));
    }
  }

  // Helper methods for testing
  clear(): void {
    this.jobs.clear();
  }

  getAllJobs(): ExportJobEntity[] {
    return Array.from(this.jobs.values());
  }

  getJobCount(): number {
    return this.jobs.size;
  }
}
