import { ExportDataRequest } from '../../../domain/model/export-data-request';
import { Principal } from '../../../domain/model/principal';

export interface PreviewExportDataCommand {
  request: ExportDataRequest;
  principal: Principal;
}

/**
 * One page of records plus the total the full export would contain
 */
export interface ExportableSearchResult {
  totalCount: number;
  results: unknown[];
}

/**
 * Preview Export Data Port (Driving Port / Use Case Interface)
 */
export interface PreviewExportDataPort {
  execute(command: PreviewExportDataCommand): Promise<ExportableSearchResult>;
}
