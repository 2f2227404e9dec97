/**
 * Use Cases Barrel Export
 */
export { ListKnownExportTypesUseCase } from './list-known-export-types.use-case';
export { ListExportProvidersUseCase } from './list-export-providers.use-case';
export { PreviewExportDataUseCase } from './preview-export-data.use-case';
export { RunExportUseCase } from './run-export.use-case';
export { ExecuteExportJobUseCase } from './execute-export-job.use-case';
export { CancelExportUseCase } from './cancel-export.use-case';
export { GetExportTaskUseCase } from './get-export-task.use-case';
export { DownloadExportFileUseCase } from './download-export-file.use-case';
