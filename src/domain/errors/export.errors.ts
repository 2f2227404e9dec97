/**
 * Export Domain Errors
 *
 * Every error raised by the export core carries a stable `code` and the HTTP
 * status the driving adapter should answer with.
 */
export abstract class ExportError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownExportTypeError extends ExportError {
  readonly code = 'UNKNOWN_EXPORT_TYPE';
  readonly statusCode = 400;

  constructor(public readonly typeName: string) {
    super(`Export type "${typeName}" is not registered`);
  }
}

export class UnknownExportProviderError extends ExportError {
  readonly code = 'UNKNOWN_EXPORT_PROVIDER';
  readonly statusCode = 400;

  constructor(public readonly providerName: string) {
    super(`Export provider "${providerName}" is not registered`);
  }
}

/**
 * Raised when a policy denies an export request.
 * The message is for logs only; the HTTP layer answers with a bare 401.
 */
export class AuthorizationDeniedError extends ExportError {
  readonly code = 'AUTHORIZATION_DENIED';
  readonly statusCode = 401;

  constructor(public readonly policyName: string) {
    super(`Policy ${policyName} denied the request`);
  }
}

export class DataSourceError extends ExportError {
  readonly code = 'DATA_SOURCE_ERROR';
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
  }

  static wrap(typeName: string, error: unknown): DataSourceError {
    if (error instanceof DataSourceError) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new DataSourceError(`Failed to query "${typeName}" data: ${reason}`, error);
  }
}

export class FileNotFoundError extends ExportError {
  readonly code = 'FILE_NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly fileName: string) {
    super(`Export file "${fileName}" was not found`);
  }
}

export class InvalidFileNameError extends ExportError {
  readonly code = 'INVALID_FILE_NAME';
  readonly statusCode = 400;

  constructor(
    public readonly fileName: string,
    reason: string,
  ) {
    super(`Invalid export file name: ${reason}`);
  }
}

export class ExportJobNotFoundError extends ExportError {
  readonly code = 'EXPORT_JOB_NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly jobId: string) {
    super(`Export job ${jobId} was not found`);
  }
}

export class InvalidJobTransitionError extends ExportError {
  readonly code = 'INVALID_JOB_TRANSITION';
  readonly statusCode = 409;

  constructor(from: string, to: string) {
    super(`Cannot transition export job from ${from} to ${to}`);
  }
}

/**
 * Cooperative cancellation signal observed by a running job.
 * Never surfaced to clients: a cancelled job is not a failed one.
 */
export class ExportCancelledError extends ExportError {
  readonly code = 'EXPORT_CANCELLED';
  readonly statusCode = 409;

  constructor(public readonly jobId: string) {
    super(`Export job ${jobId} was cancelled`);
  }
}
