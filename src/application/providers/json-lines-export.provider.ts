import { Writable } from 'stream';
import { ExportProvider, ExportRecordWriter } from '../../domain/model/export-provider';
import { endOutput, writeChunk } from './stream-output';

/**
 * Writes one JSON document per line.
 */
export class JsonLinesExportProvider implements ExportProvider {
  static readonly TYPE_NAME = 'JsonLinesExportProvider';

  readonly typeName = JsonLinesExportProvider.TYPE_NAME;
  readonly exportedFileExtension = 'jsonl';
  readonly contentType = 'application/x-ndjson';
  readonly isTabular = false;

  open(output: Writable): ExportRecordWriter {
    return {
      writeRecords: async (records) => {
        await writeChunk(output, records.map((record) => `${JSON.stringify(record)}\n`).join(''));
      },
      finish: async () => {
        await endOutput(output);
      },
    };
  }
}
