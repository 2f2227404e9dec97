import { ExportedTypeDescriptor } from '../../../domain/model/exported-type-definition';

/**
 * List Known Export Types Port (Driving Port / Use Case Interface)
 */
export interface ListKnownExportTypesPort {
  execute(): ExportedTypeDescriptor[];
}
