import { Injectable, Logger } from '@nestjs/common';
import {
  ExportableSearchResult,
  PreviewExportDataCommand,
  PreviewExportDataPort,
} from '../ports/input/preview-export-data.port';
import { ExportAuthorizationService } from '../authorization/export-authorization.service';
import { PagedDataSource } from '../../domain/model/paged-data-source';
import { DataSourceError } from '../../domain/errors/export.errors';

/**
 * Preview Export Data Use Case
 * Fetches a single page so the client can show a sample and the total count
 */
@Injectable()
export class PreviewExportDataUseCase implements PreviewExportDataPort {
  private readonly logger = new Logger(PreviewExportDataUseCase.name);

  constructor(private readonly authorization: ExportAuthorizationService) {}

  async execute(command: PreviewExportDataCommand): Promise<ExportableSearchResult> {
    const { request, principal } = command;

    const definition = await this.authorization.ensureAuthorized(principal, request);

    let dataSource: PagedDataSource;
    try {
      dataSource = definition.dataSourceFactory(request.dataQuery);
    } catch (error) {
      throw DataSourceError.wrap(definition.typeName, error);
    }

    const results = await dataSource.fetchPage();
    const totalCount = await dataSource.getTotalCount();

    this.logger.debug(
      `Previewed ${results.length} of ${totalCount} ${definition.typeName} records`,
    );

    return {
      totalCount,
      results: [...results],
    };
  }
}
