/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export type { ListKnownExportTypesPort } from './list-known-export-types.port';
export type { ListExportProvidersPort } from './list-export-providers.port';
export type {
  PreviewExportDataPort,
  PreviewExportDataCommand,
  ExportableSearchResult,
} from './preview-export-data.port';
export type { RunExportPort, RunExportCommand } from './run-export.port';
export type {
  ExecuteExportJobPort,
  ExecuteExportJobCommand,
  ExecuteExportJobOutcome,
} from './execute-export-job.port';
export type {
  CancelExportPort,
  CancelExportCommand,
  CancelExportResult,
} from './cancel-export.port';
export type { GetExportTaskPort, GetExportTaskCommand } from './get-export-task.port';
export type {
  DownloadExportFilePort,
  DownloadExportFileCommand,
  DownloadExportFileResult,
} from './download-export-file.port';
