import { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface CancelExportCommand {
  jobId: string;
}

export interface CancelExportResult {
  jobId: string;
  /** True when this request changed the job (cancelled it or flagged it) */
  accepted: boolean;
  status?: JobStatus;
}

/**
 * Cancel Export Port (Driving Port / Use Case Interface)
 * Idempotent: unknown and finished jobs are a no-op
 */
export interface CancelExportPort {
  execute(command: CancelExportCommand): Promise<CancelExportResult>;
}
