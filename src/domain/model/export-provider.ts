import { Writable } from 'stream';
import { ExportDataRequest } from './export-data-request';

/**
 * Writes records of one export run into an output stream.
 */
export interface ExportRecordWriter {
  writeRecords(records: ReadonlyArray<unknown>): Promise<void>;

  /** Writes any trailer and ends the output stream */
  finish(): Promise<void>;
}

export interface ExportProviderDescriptor {
  readonly typeName: string;
  readonly exportedFileExtension: string;
  readonly contentType: string;
  readonly isTabular: boolean;
}

export interface ExportProvider extends ExportProviderDescriptor {
  open(output: Writable): ExportRecordWriter;
}

export type ExportProviderContext = Partial<ExportDataRequest>;

export type ExportProviderFactory = (context: ExportProviderContext) => ExportProvider;
