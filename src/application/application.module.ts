import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { KnownExportTypesRegistry } from './registry/known-export-types.registry';
import { ExportProviderRegistry } from './providers/export-provider.registry';
import { JsonExportProvider } from './providers/json-export.provider';
import { JsonLinesExportProvider } from './providers/json-lines-export.provider';
import { ExportAuthorizationService } from './authorization/export-authorization.service';

// Use Cases
import {
  ListKnownExportTypesUseCase,
  ListExportProvidersUseCase,
  PreviewExportDataUseCase,
  RunExportUseCase,
  ExecuteExportJobUseCase,
  CancelExportUseCase,
  GetExportTaskUseCase,
  DownloadExportFileUseCase,
} from './use-cases';

export function createExportProviderRegistry(): ExportProviderRegistry {
  const registry = new ExportProviderRegistry();
  registry.register((context) => new JsonExportProvider(context));
  registry.register(() => new JsonLinesExportProvider());
  return registry;
}

const useCases = [
  ListKnownExportTypesUseCase,
  ListExportProvidersUseCase,
  PreviewExportDataUseCase,
  RunExportUseCase,
  ExecuteExportJobUseCase,
  CancelExportUseCase,
  GetExportTaskUseCase,
  DownloadExportFileUseCase,
];

/**
 * Application Module
 * Contains the registries, the authorization gate and all use cases
 *
 * Use cases depend on output ports (tokens) only; the implementations come
 * from InfrastructureModule. Feature modules import this module and register
 * their export types on KnownExportTypesRegistry during onModuleInit.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    KnownExportTypesRegistry,
    {
      provide: ExportProviderRegistry,
      useFactory: createExportProviderRegistry,
    },
    ExportAuthorizationService,
    ...useCases,
  ],
  exports: [KnownExportTypesRegistry, ExportProviderRegistry, ...useCases],
})
export class ApplicationModule {}
