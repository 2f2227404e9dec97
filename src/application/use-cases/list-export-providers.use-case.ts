import { Injectable } from '@nestjs/common';
import { ListExportProvidersPort } from '../ports/input/list-export-providers.port';
import { ExportProviderRegistry } from '../providers/export-provider.registry';
import { ExportProviderDescriptor } from '../../domain/model/export-provider';

@Injectable()
export class ListExportProvidersUseCase implements ListExportProvidersPort {
  constructor(private readonly providers: ExportProviderRegistry) {}

  execute(): ExportProviderDescriptor[] {
    return this.providers.listProviders();
  }
}
