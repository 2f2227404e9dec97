import { Logger } from '@nestjs/common';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { finished } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import {
  ExportFileStoragePort,
  ExportFileWriter,
  StoredFileStream,
} from '../../../application/ports/output/export-file-storage.port';
import { ExportFileNameVO } from '../../../domain/value-objects/export-file-name.vo';
import { FileNotFoundError } from '../../../domain/errors/export.errors';
import { resolveContentType } from './content-types';

const PARTIAL_DIR = '.partial';

/**
 * Local Export File Storage Adapter
 *
 * Files live flat under `root`. Writers stream into `root/.partial/` and are
 * renamed into place on commit, so a reader never sees half a file.
 */
export class LocalExportFileStorageAdapter implements ExportFileStoragePort {
  private readonly logger = new Logger(LocalExportFileStorageAdapter.name);

  constructor(private readonly root: string) {}

  async openRead(fileName: string): Promise<StoredFileStream> {
    const name = ExportFileNameVO.create(fileName);
    const path = this.pathOf(name);

    const stats = await this.statFile(path);
    if (!stats) {
      throw new FileNotFoundError(name.value);
    }

    return {
      stream: createReadStream(path),
      contentType: resolveContentType(name),
      contentLength: stats.size,
    };
  }

  async openWrite(fileName: string): Promise<ExportFileWriter> {
    const name = ExportFileNameVO.create(fileName);
    const finalPath = this.pathOf(name);

    const partialDir = join(this.root, PARTIAL_DIR);
    await fs.mkdir(partialDir, { recursive: true });
    const tempPath = join(partialDir, `${uuidv4()}.part`);

    const stream = createWriteStream(tempPath);
    let streamError: Error | undefined;
    stream.on('error', (error) => {
      streamError ??= error;
      this.logger.error(`Write to ${name.value} failed: ${error.message}`);
    });
    let settled = false;
    const settle = (action: string) => {
      if (settled) {
        throw new Error(`Writer for ${name.value} already closed, cannot ${action}`);
      }
      settled = true;
    };

    this.logger.debug(`Writing ${name.value} via ${tempPath}`);

    return {
      fileName: name.value,
      stream,
      commit: async () => {
        settle('commit');
        try {
          if (streamError) {
            throw streamError;
          }
          if (!stream.writableFinished) {
            stream.end();
            await finished(stream);
          }
          await fs.rename(tempPath, finalPath);
        } catch (error) {
          stream.destroy();
          await fs.rm(tempPath, { force: true });
          throw streamError ?? error;
        }
        this.logger.log(`Published export file ${name.value}`);
      },
      abort: async () => {
        settle('abort');
        stream.destroy();
        await fs.rm(tempPath, { force: true });
        this.logger.debug(`Discarded partial file for ${name.value}`);
      },
    };
  }

  async exists(fileName: string): Promise<boolean> {
    const name = ExportFileNameVO.create(fileName);
    return (await this.statFile(this.pathOf(name))) !== null;
  }

  async delete(fileName: string): Promise<void> {
    const name = ExportFileNameVO.create(fileName);
    await fs.rm(this.pathOf(name), { force: true });
  }

  private pathOf(name: ExportFileNameVO): string {
    return join(this.root, name.value);
  }

  private async statFile(path: string): Promise<{ size: number } | null> {
    try {
      const stats = await fs.stat(path);
      return stats.isFile() ? { size: stats.size } : null;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
