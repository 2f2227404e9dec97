import { produce } from 'immer';
import { JobStatus } from '../value-objects/job-status.vo';

/**
 * Export Push Notification
 * Status message delivered to the user who started an export.
 *
 * One notification per job: every update keeps the same `id`, so a client can
 * replace what it shows instead of stacking messages.
 */
export interface ExportPushNotification {
  readonly id: string;
  readonly jobId: string;
  readonly notifyType: string;
  readonly creator: string;
  readonly title: string;
  readonly description: string;
  readonly status: JobStatus;
  readonly created: string;
  readonly finished?: string;
  readonly processedCount: number;
  readonly totalCount: number;
  readonly fileName?: string;
  readonly downloadUrl?: string;
  readonly errors: ReadonlyArray<string>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportPushNotification {
  export const NOTIFY_TYPE = 'ExportPushNotification';

  export interface CreateProps {
    id: string;
    jobId: string;
    creator: string;
    exportTypeName: string;
    now?: Date;
  }

  export function create(props: CreateProps): ExportPushNotification {
    return {
      id: props.id,
      jobId: props.jobId,
      notifyType: NOTIFY_TYPE,
      creator: props.creator,
      title: `${titleFor(props.exportTypeName)} export`,
      description: 'Starting export task...',
      status: JobStatus.QUEUED,
      created: (props.now ?? new Date()).toISOString(),
      processedCount: 0,
      totalCount: 0,
      errors: [],
    };
  }

  /**
   * Last `.`-delimited segment of a type name, or the whole name.
   */
  export function titleFor(exportTypeName: string): string {
    const lastDot = exportTypeName.lastIndexOf('.');
    return lastDot > 0 ? exportTypeName.substring(lastDot + 1) : exportTypeName;
  }

  export function started(notification: ExportPushNotification): ExportPushNotification {
    return produce(notification, (draft) => {
      draft.status = JobStatus.RUNNING;
      draft.description = 'Export started';
    });
  }

  export function progressed(
    notification: ExportPushNotification,
    processedCount: number,
    totalCount: number,
  ): ExportPushNotification {
    return produce(notification, (draft) => {
      draft.processedCount = processedCount;
      draft.totalCount = totalCount;
      draft.description = `${processedCount} of ${totalCount} records exported`;
    });
  }

  export function completed(
    notification: ExportPushNotification,
    fileName: string,
    downloadUrl: string,
    now: Date = new Date(),
  ): ExportPushNotification {
    return produce(notification, (draft) => {
      draft.status = JobStatus.COMPLETED;
      draft.description = 'Export finished';
      draft.fileName = fileName;
      draft.downloadUrl = downloadUrl;
      draft.finished = now.toISOString();
    });
  }

  export function failed(
    notification: ExportPushNotification,
    errorMessage: string,
    now: Date = new Date(),
  ): ExportPushNotification {
    return produce(notification, (draft) => {
      draft.status = JobStatus.FAILED;
      draft.description = 'Export failed';
      draft.errors.push(errorMessage);
      draft.finished = now.toISOString();
    });
  }

  export function cancelled(
    notification: ExportPushNotification,
    now: Date = new Date(),
  ): ExportPushNotification {
    return produce(notification, (draft) => {
      draft.status = JobStatus.CANCELLED;
      draft.description = 'Export was cancelled by the user';
      draft.finished = now.toISOString();
    });
  }

  export function isTerminal(notification: ExportPushNotification): boolean {
    return (
      notification.status === JobStatus.COMPLETED ||
      notification.status === JobStatus.FAILED ||
      notification.status === JobStatus.CANCELLED
    );
  }
}
