import { StoredFileStream } from '../output/export-file-storage.port';

export interface DownloadExportFileCommand {
  fileName: string;
}

export interface DownloadExportFileResult extends StoredFileStream {
  fileName: string;
}

/**
 * Download Export File Port (Driving Port / Use Case Interface)
 */
export interface DownloadExportFilePort {
  execute(command: DownloadExportFileCommand): Promise<DownloadExportFileResult>;
}
