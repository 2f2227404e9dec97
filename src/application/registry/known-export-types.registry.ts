import { Injectable, Logger } from '@nestjs/common';
import {
  ExportedTypeDefinition,
  ExportedTypeDescriptor,
} from '../../domain/model/exported-type-definition';
import { UnknownExportTypeError } from '../../domain/errors/export.errors';

/**
 * Known Export Types Registry
 *
 * Holds every exportable entity type for the lifetime of the process.
 * Feature modules register their types during `onModuleInit`; requests
 * resolve them by logical name.
 */
@Injectable()
export class KnownExportTypesRegistry {
  private readonly logger = new Logger(KnownExportTypesRegistry.name);
  private readonly definitions = new Map<string, ExportedTypeDefinition>();

  /**
   * Adds a definition, replacing any previous one with the same name
   */
  register<T>(definition: ExportedTypeDefinition<T>): void {
    if (!definition.typeName || definition.typeName.trim().length === 0) {
      throw new Error('Export type name is required');
    }

    const replaced = this.definitions.has(definition.typeName);
    this.definitions.set(definition.typeName, Object.freeze({ ...definition }));

    this.logger.log(
      `${replaced ? 'Replaced' : 'Registered'} export type ${definition.typeName}`,
    );
  }

  listRegistered(): ExportedTypeDefinition[] {
    return Array.from(this.definitions.values());
  }

  describeRegistered(): ExportedTypeDescriptor[] {
    return this.listRegistered().map((definition) => ({
      typeName: definition.typeName,
      requiredPermission: definition.requiredPermission,
      metadata: definition.metadata ?? {},
    }));
  }

  isRegistered(typeName: string): boolean {
    return this.definitions.has(typeName);
  }

  /**
   * @throws UnknownExportTypeError when nothing is registered under `typeName`
   */
  resolve(typeName: string): ExportedTypeDefinition {
    const definition = this.definitions.get(typeName);
    if (!definition) {
      throw new UnknownExportTypeError(typeName);
    }
    return definition;
  }
}
