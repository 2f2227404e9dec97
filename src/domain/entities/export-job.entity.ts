import { produce } from 'immer';
import { ExportDataRequest } from '../model/export-data-request';
import { ExportPushNotification } from './export-notification.entity';
import { JobStatus, JobStatusVO } from '../value-objects/job-status.vo';
import { InvalidJobTransitionError } from '../errors/export.errors';

/**
 * Export Job Entity - Aggregate Root
 * One accepted export run, from queue entry to terminal state.
 *
 * Data lives in a plain readonly interface so it can be persisted as-is;
 * behaviour lives in the namespace as pure functions returning new instances.
 */
export interface ExportJobEntity {
  readonly jobId: string;
  readonly request: ExportDataRequest;
  readonly userName: string;
  readonly status: JobStatus;
  readonly notification: ExportPushNotification;
  readonly fileName?: string;
  readonly errorMessage?: string;
  readonly cancellationRequested: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Fields a status transition may set alongside the new status
 */
export interface ExportJobChanges {
  notification?: ExportPushNotification;
  fileName?: string;
  errorMessage?: string;
}

/**
 * ESLint disable: Namespaces are acceptable for this functional pattern
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportJobEntity {
  export interface CreateProps {
    jobId: string;
    request: ExportDataRequest;
    userName: string;
    notification: ExportPushNotification;
    now?: Date;
  }

  export function create(props: CreateProps): ExportJobEntity {
    validate(props);

    const timestamp = (props.now ?? new Date()).toISOString();

    return {
      jobId: props.jobId,
      request: props.request,
      userName: props.userName,
      status: JobStatus.QUEUED,
      notification: props.notification,
      cancellationRequested: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  function validate(props: CreateProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.request.exportTypeName || props.request.exportTypeName.trim().length === 0) {
      throw new Error('Export type name is required');
    }
    if (props.notification.jobId !== props.jobId) {
      throw new Error('Notification belongs to a different job');
    }
  }

  // ===== Queries =====

  export function statusOf(job: ExportJobEntity): JobStatusVO {
    return JobStatusVO.of(job.status);
  }

  export function isTerminal(job: ExportJobEntity): boolean {
    return statusOf(job).isTerminal();
  }

  // ===== State Mutations (return new instances via Immer) =====

  export function transitionTo(
    job: ExportJobEntity,
    status: JobStatus,
    changes: ExportJobChanges = {},
    now: Date = new Date(),
  ): ExportJobEntity {
    if (!statusOf(job).canTransitionTo(JobStatusVO.of(status))) {
      throw new InvalidJobTransitionError(job.status, status);
    }

    return produce(job, (draft) => {
      draft.status = status;
      draft.updatedAt = now.toISOString();
      if (changes.notification) {
        draft.notification = changes.notification;
      }
      if (changes.fileName !== undefined) {
        draft.fileName = changes.fileName;
      }
      if (changes.errorMessage !== undefined) {
        draft.errorMessage = changes.errorMessage;
      }
    });
  }

  export function withNotification(
    job: ExportJobEntity,
    notification: ExportPushNotification,
    now: Date = new Date(),
  ): ExportJobEntity {
    return produce(job, (draft) => {
      draft.notification = notification;
      draft.updatedAt = now.toISOString();
    });
  }

  export function withCancellationRequested(
    job: ExportJobEntity,
    now: Date = new Date(),
  ): ExportJobEntity {
    return produce(job, (draft) => {
      draft.cancellationRequested = true;
      draft.updatedAt = now.toISOString();
    });
  }
}
