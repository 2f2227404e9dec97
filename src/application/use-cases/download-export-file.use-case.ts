import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DownloadExportFileCommand,
  DownloadExportFilePort,
  DownloadExportFileResult,
} from '../ports/input/download-export-file.port';
import { ExportFileStoragePort } from '../ports/output/export-file-storage.port';
import { EXPORT_FILE_STORAGE_PORT } from '../ports/output/injection-tokens';
import { ExportFileNameVO } from '../../domain/value-objects/export-file-name.vo';

/**
 * Download Export File Use Case
 * Streams a published export file; nothing is buffered in memory
 */
@Injectable()
export class DownloadExportFileUseCase implements DownloadExportFilePort {
  private readonly logger = new Logger(DownloadExportFileUseCase.name);

  constructor(
    @Inject(EXPORT_FILE_STORAGE_PORT)
    private readonly storage: ExportFileStoragePort,
  ) {}

  async execute(command: DownloadExportFileCommand): Promise<DownloadExportFileResult> {
    const fileName = ExportFileNameVO.create(command.fileName).value;

    const file = await this.storage.openRead(fileName);
    this.logger.debug(`Streaming export file ${fileName}`);

    return { ...file, fileName };
  }
}
