/**
 * Job Status Value Object
 * Lifecycle of one export run
 */
export enum JobStatus {
  QUEUED = 'QUEUED',
  RUNNING = 'RUNNING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

const TRANSITIONS: Record<JobStatus, ReadonlyArray<JobStatus>> = {
  [JobStatus.QUEUED]: [JobStatus.RUNNING, JobStatus.CANCELLED, JobStatus.FAILED],
  [JobStatus.RUNNING]: [JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.CANCELLED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.CANCELLED]: [],
};

const JOB_STATUSES: ReadonlyArray<string> = Object.values(JobStatus);

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.includes(value);
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toUpperCase();
    if (!isJobStatus(normalizedValue)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(normalizedValue);
  }

  static of(value: JobStatus): JobStatusVO {
    return new JobStatusVO(value);
  }

  static queued(): JobStatusVO {
    return new JobStatusVO(JobStatus.QUEUED);
  }

  static running(): JobStatusVO {
    return new JobStatusVO(JobStatus.RUNNING);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  static cancelled(): JobStatusVO {
    return new JobStatusVO(JobStatus.CANCELLED);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this._value].length === 0;
  }

  isQueued(): boolean {
    return this._value === JobStatus.QUEUED;
  }

  isRunning(): boolean {
    return this._value === JobStatus.RUNNING;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  isCancelled(): boolean {
    return this._value === JobStatus.CANCELLED;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    return TRANSITIONS[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
