import { ExportProviderDescriptor } from '../../../domain/model/export-provider';

/**
 * List Export Providers Port (Driving Port / Use Case Interface)
 */
export interface ListExportProvidersPort {
  execute(): ExportProviderDescriptor[];
}
