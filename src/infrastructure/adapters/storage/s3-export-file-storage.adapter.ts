import { Logger } from '@nestjs/common';
import { PassThrough } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import {
  ExportFileStoragePort,
  ExportFileWriter,
  StoredFileStream,
} from '../../../application/ports/output/export-file-storage.port';
import { ExportFileNameVO } from '../../../domain/value-objects/export-file-name.vo';
import { FileNotFoundError } from '../../../domain/errors/export.errors';
import { S3Service } from '../../../shared/aws/s3/s3.service';
import { resolveContentType } from './content-types';

const PARTIAL_PREFIX = '.partial/';

/**
 * S3 Export File Storage Adapter
 *
 * Writers upload to a temporary key; commit copies it to the final key and
 * removes the temporary one.
 */
export class S3ExportFileStorageAdapter implements ExportFileStoragePort {
  private readonly logger = new Logger(S3ExportFileStorageAdapter.name);

  constructor(private readonly s3: S3Service) {}

  async openRead(fileName: string): Promise<StoredFileStream> {
    const name = ExportFileNameVO.create(fileName);

    const object = await this.s3.getObjectStream(name.value);
    if (!object) {
      throw new FileNotFoundError(name.value);
    }

    return {
      stream: object.stream,
      contentType: resolveContentType(name),
      contentLength: object.contentLength,
    };
  }

  async openWrite(fileName: string): Promise<ExportFileWriter> {
    const name = ExportFileNameVO.create(fileName);
    const contentType = resolveContentType(name);
    const tempKey = `${PARTIAL_PREFIX}${uuidv4()}`;

    const body = new PassThrough();
    const upload = this.s3.createUpload(tempKey, body, { contentType });
    const done = upload.done();
    done.catch((error) => {
      this.logger.debug(`Upload of ${tempKey} ended with ${String(error)}`);
    });

    let settled = false;
    const settle = (action: string) => {
      if (settled) {
        throw new Error(`Writer for ${name.value} already closed, cannot ${action}`);
      }
      settled = true;
    };

    return {
      fileName: name.value,
      stream: body,
      commit: async () => {
        settle('commit');
        if (!body.writableEnded) {
          body.end();
        }
        await done;
        await this.s3.copyObject(tempKey, name.value, contentType);
        await this.s3.deleteObject(tempKey);
        this.logger.log(`Published export file ${name.value}`);
      },
      abort: async () => {
        settle('abort');
        body.destroy();
        await upload.abort();
        await this.s3.deleteObject(tempKey);
        this.logger.debug(`Discarded partial upload for ${name.value}`);
      },
    };
  }

  async exists(fileName: string): Promise<boolean> {
    const name = ExportFileNameVO.create(fileName);
    return (await this.s3.headObject(name.value)) !== null;
  }

  async delete(fileName: string): Promise<void> {
    const name = ExportFileNameVO.create(fileName);
    await this.s3.deleteObject(name.value);
  }
}
