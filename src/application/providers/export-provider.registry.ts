import { Injectable, Logger } from '@nestjs/common';
import {
  ExportProvider,
  ExportProviderContext,
  ExportProviderDescriptor,
  ExportProviderFactory,
} from '../../domain/model/export-provider';
import { UnknownExportProviderError } from '../../domain/errors/export.errors';

/**
 * Export Provider Registry
 *
 * Provider factories are probed with a request context; an empty context is
 * enough to learn what a provider is and which file it produces.
 */
@Injectable()
export class ExportProviderRegistry {
  private readonly logger = new Logger(ExportProviderRegistry.name);
  private readonly factories: ExportProviderFactory[] = [];

  register(factory: ExportProviderFactory): void {
    const probe = factory({});
    this.factories.push(factory);
    this.logger.log(`Registered export provider ${probe.typeName}`);
  }

  listProviders(): ExportProviderDescriptor[] {
    return this.factories.map((factory) => {
      const provider = factory({});
      return {
        typeName: provider.typeName,
        exportedFileExtension: provider.exportedFileExtension,
        contentType: provider.contentType,
        isTabular: provider.isTabular,
      };
    });
  }

  /**
   * Provider named by `context.providerName`, or the first registered one
   *
   * @throws UnknownExportProviderError when no registered provider has that name
   */
  create(context: ExportProviderContext): ExportProvider {
    const wanted = context.providerName?.toLowerCase();

    for (const factory of this.factories) {
      const provider = factory(context);
      if (!wanted || provider.typeName.toLowerCase() === wanted) {
        return provider;
      }
    }

    throw new UnknownExportProviderError(context.providerName ?? '(default)');
  }
}
