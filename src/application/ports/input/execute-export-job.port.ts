import { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface ExecuteExportJobCommand {
  jobId: string;
}

/**
 * `skipped` means the worker did not claim the job: it was cancelled while
 * queued, already picked up by another delivery, or no longer exists.
 */
export type ExecuteExportJobOutcome =
  | { outcome: 'skipped'; jobId: string; status?: JobStatus }
  | { outcome: 'completed'; jobId: string; fileName: string; exportedCount: number }
  | { outcome: 'failed'; jobId: string; errorMessage: string }
  | { outcome: 'cancelled'; jobId: string; exportedCount: number };

/**
 * Execute Export Job Port (Driving Port / Use Case Interface)
 * Body of one background export run. Never throws for job-level failures.
 */
export interface ExecuteExportJobPort {
  execute(command: ExecuteExportJobCommand): Promise<ExecuteExportJobOutcome>;
}
