import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalExportFileStorageAdapter } from '../../../src/infrastructure/adapters/storage/local-export-file-storage.adapter';
import { ExportFileWriter } from '../../../src/application/ports/output/export-file-storage.port';
import {
  FileNotFoundError,
  InvalidFileNameError,
} from '../../../src/domain/errors/export.errors';
import { readAll } from '../helpers/mock-factories';

const writeChunk = (writer: ExportFileWriter, chunk: string) =>
  new Promise<void>((resolve, reject) => {
    writer.stream.write(chunk, (error) => (error ? reject(error) : resolve()));
  });

describe('LocalExportFileStorageAdapter', () => {
  let root: string;
  let adapter: LocalExportFileStorageAdapter;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(tmpdir(), 'export-storage-'));
    adapter = new LocalExportFileStorageAdapter(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should publish a file only once it is committed', async () => {
    const writer = await adapter.openWrite('report.json');
    await writeChunk(writer, '[1,');
    await writeChunk(writer, '2]\n');

    await expect(adapter.exists('report.json')).resolves.toBe(false);
    await writer.commit();

    await expect(adapter.exists('report.json')).resolves.toBe(true);
    await expect(fs.readdir(join(root, '.partial'))).resolves.toEqual([]);
  });

  it('should stream a committed file back with its size and content type', async () => {
    const writer = await adapter.openWrite('report.jsonl');
    writer.stream.write('{"id":1}\n');
    await writer.commit();

    const file = await adapter.openRead('report.jsonl');

    expect(file.contentType).toBe('application/x-ndjson');
    expect(file.contentLength).toBe(9);
    expect(await readAll(file.stream)).toBe('{"id":1}\n');
  });

  it('should discard the partial file on abort', async () => {
    const writer = await adapter.openWrite('report.json');
    await writeChunk(writer, '[');

    await writer.abort();

    await expect(adapter.exists('report.json')).resolves.toBe(false);
    await expect(fs.readdir(join(root, '.partial'))).resolves.toEqual([]);
  });

  it('should reject the commit when the partial file cannot be opened', async () => {
    const writer = await adapter.openWrite('report.json');
    await fs.rm(join(root, '.partial'), { recursive: true, force: true });

    await expect(writer.commit()).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(adapter.exists('report.json')).resolves.toBe(false);
  });

  it('should reject the commit with the first write error', async () => {
    const writer = await adapter.openWrite('report.json');
    const closed = new Promise((resolve) => writer.stream.once('close', resolve));
    writer.stream.destroy(new Error('disk full'));
    await closed;

    await expect(writer.commit()).rejects.toThrow('disk full');
    await expect(adapter.exists('report.json')).resolves.toBe(false);
    await expect(fs.readdir(join(root, '.partial'))).resolves.toEqual([]);
  });

  it('should refuse to settle a writer twice', async () => {
    const writer = await adapter.openWrite('report.json');
    await writer.commit();

    await expect(writer.abort()).rejects.toThrow(
      'Writer for report.json already closed, cannot abort',
    );
  });

  it('should throw FileNotFoundError for missing files', async () => {
    await expect(adapter.openRead('missing.json')).rejects.toThrow(FileNotFoundError);
  });

  it('should not serve directories', async () => {
    await fs.mkdir(join(root, 'folder.json'));

    await expect(adapter.openRead('folder.json')).rejects.toThrow(FileNotFoundError);
    await expect(adapter.exists('folder.json')).resolves.toBe(false);
  });

  it('should delete published files and ignore missing ones', async () => {
    await fs.writeFile(join(root, 'report.json'), '[]\n');

    await adapter.delete('report.json');
    await adapter.delete('report.json');

    await expect(adapter.exists('report.json')).resolves.toBe(false);
  });

  it('should reject names that leave the storage root', async () => {
    await expect(adapter.openRead('..')).rejects.toThrow(InvalidFileNameError);
    await expect(adapter.openWrite('nested/report.json')).rejects.toThrow(InvalidFileNameError);
  });
});
