import { Writable } from 'stream';
import {
  ExportProvider,
  ExportProviderContext,
  ExportRecordWriter,
} from '../../domain/model/export-provider';
import { endOutput, writeChunk } from './stream-output';

/**
 * Writes records as one JSON array, a page at a time.
 */
export class JsonExportProvider implements ExportProvider {
  static readonly TYPE_NAME = 'JsonExportProvider';

  readonly typeName = JsonExportProvider.TYPE_NAME;
  readonly exportedFileExtension = 'json';
  readonly contentType = 'application/json';
  readonly isTabular = false;

  private readonly indent?: number;

  constructor(context: ExportProviderContext = {}) {
    const indent = context.providerConfig?.indent;
    this.indent = typeof indent === 'number' && indent > 0 ? indent : undefined;
  }

  open(output: Writable): ExportRecordWriter {
    let written = 0;

    return {
      writeRecords: async (records) => {
        let chunk = '';
        for (const record of records) {
          chunk += `${written === 0 ? '[\n' : ',\n'}${JSON.stringify(record, null, this.indent)}`;
          written += 1;
        }
        await writeChunk(output, chunk);
      },
      finish: async () => {
        await endOutput(output, written === 0 ? '[]\n' : '\n]\n');
      },
    };
  }
}
