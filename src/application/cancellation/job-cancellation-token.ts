import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { ExportCancelledError } from '../../domain/errors/export.errors';

/**
 * Cooperative cancellation for one running job.
 *
 * Cancellation is requested on the job record, so a cancel handled by any
 * instance reaches the worker running the job. The worker checks between
 * pages; an in-flight fetch or write is never interrupted.
 */
export class JobCancellationToken {
  private cancelled = false;

  constructor(
    private readonly jobId: string,
    private readonly repository: JobStateRepositoryPort,
  ) {}

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  async refresh(): Promise<boolean> {
    if (!this.cancelled) {
      this.cancelled = await this.repository.isCancellationRequested(this.jobId);
    }
    return this.cancelled;
  }

  /**
   * @throws ExportCancelledError once cancellation has been requested
   */
  async throwIfCancellationRequested(): Promise<void> {
    if (await this.refresh()) {
      throw new ExportCancelledError(this.jobId);
    }
  }
}
