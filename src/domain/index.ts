/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and has no framework dependencies.
 */

// Entities
export { ExportJobEntity, type ExportJobChanges } from './entities/export-job.entity';
export { ExportPushNotification } from './entities/export-notification.entity';

// Value Objects
export { JobStatusVO, JobStatus } from './value-objects/job-status.vo';
export { ExportFileNameVO } from './value-objects/export-file-name.vo';

// Model
export type { ExportDataQuery, ExportDataRequest } from './model/export-data-request';
export type { PagedDataSource, DataSourceFactory } from './model/paged-data-source';
export type {
  ExportProvider,
  ExportProviderContext,
  ExportProviderDescriptor,
  ExportProviderFactory,
  ExportRecordWriter,
} from './model/export-provider';
export type {
  ExportDataPolicy,
  ExportedTypeDefinition,
  ExportedTypeDescriptor,
} from './model/exported-type-definition';
export {
  ANONYMOUS_PRINCIPAL,
  hasAnyPermission,
  hasPermission,
  type Principal,
} from './model/principal';

// Errors
export * from './errors/export.errors';

// Events
export * from './events';
