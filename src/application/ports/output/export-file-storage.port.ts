import { Readable, Writable } from 'stream';

/**
 * A file being streamed out of storage
 */
export interface StoredFileStream {
  stream: Readable;
  contentType: string;
  contentLength?: number;
}

/**
 * A file being written by one export job.
 *
 * Data written to `stream` is invisible to readers until `commit()` resolves;
 * `abort()` discards it. Exactly one of the two must be called.
 */
export interface ExportFileWriter {
  readonly fileName: string;
  readonly stream: Writable;
  commit(): Promise<void>;
  abort(): Promise<void>;
}

/**
 * Export File Storage Port (Driven Port)
 * Write-once, read-many store of export outputs keyed by file name.
 * Implementations validate every name before touching the backend.
 */
export interface ExportFileStoragePort {
  /**
   * @throws FileNotFoundError when no published file has that name
   * @throws InvalidFileNameError for names that could escape the storage root
   */
  openRead(fileName: string): Promise<StoredFileStream>;

  openWrite(fileName: string): Promise<ExportFileWriter>;

  exists(fileName: string): Promise<boolean>;

  delete(fileName: string): Promise<void>;
}
