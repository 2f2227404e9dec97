import { ExportFileNameVO } from '../../../domain/value-objects/export-file-name.vo';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPES: Record<string, string> = {
  json: 'application/json',
  jsonl: 'application/x-ndjson',
  csv: 'text/csv',
  xml: 'application/xml',
  txt: 'text/plain',
  zip: 'application/zip',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export function resolveContentType(fileName: ExportFileNameVO): string {
  return CONTENT_TYPES[fileName.extension] ?? DEFAULT_CONTENT_TYPE;
}
