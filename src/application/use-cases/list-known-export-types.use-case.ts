import { Injectable } from '@nestjs/common';
import { ListKnownExportTypesPort } from '../ports/input/list-known-export-types.port';
import { KnownExportTypesRegistry } from '../registry/known-export-types.registry';
import { ExportedTypeDescriptor } from '../../domain/model/exported-type-definition';

@Injectable()
export class ListKnownExportTypesUseCase implements ListKnownExportTypesPort {
  constructor(private readonly registry: KnownExportTypesRegistry) {}

  execute(): ExportedTypeDescriptor[] {
    return this.registry.describeRegistered();
  }
}
