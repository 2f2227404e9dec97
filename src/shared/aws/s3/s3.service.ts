import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  S3Client,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  CopyObjectCommand,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { AppConfig } from '../../../config/configuration';

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface ObjectStream {
  stream: Readable;
  contentType?: string;
  contentLength?: number;
}

export interface ObjectHead {
  size: number;
  contentType?: string;
  etag?: string;
}

/**
 * Object access for the export bucket. Keys passed in are relative to the
 * configured prefix.
 */
@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly logger = new Logger(S3Service.name);
  private readonly client: S3Client;
  private readonly bucketName?: string;
  private readonly prefix: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const storageConfig = this.configService.getOrThrow('storage', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = storageConfig.bucketName;
    this.prefix = storageConfig.prefix;
  }

  get bucket(): string {
    if (!this.bucketName) {
      throw new Error('S3_BUCKET_NAME is not configured');
    }
    return this.bucketName;
  }

  /**
   * Multipart upload fed from `body`; nothing is sent until the caller awaits `done()`
   */
  createUpload(key: string, body: Readable, options?: UploadOptions): Upload {
    const fullKey = this.getFullKey(key);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: fullKey,
        Body: body,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.verbose(`Upload progress ${fullKey}: ${progress.loaded ?? 0} bytes`);
    });

    return upload;
  }

  async copyObject(sourceKey: string, destinationKey: string, contentType?: string): Promise<void> {
    const source = this.getFullKey(sourceKey);
    const destination = this.getFullKey(destinationKey);

    await this.client.send(
      new CopyObjectCommand({
        Bucket: this.bucket,
        CopySource: `${this.bucket}/${encodeURI(source)}`,
        Key: destination,
        ...(contentType && { ContentType: contentType, MetadataDirective: 'REPLACE' }),
      }),
    );

    this.logger.debug(`Copied ${source} to ${destination}`);
  }

  /**
   * @returns null when the object does not exist
   */
  async getObjectStream(key: string): Promise<ObjectStream | null> {
    const fullKey = this.getFullKey(key);

    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: fullKey,
        }),
      );

      if (!(response.Body instanceof Readable)) {
        throw new Error(`Object ${fullKey} has no readable body`);
      }

      return {
        stream: response.Body,
        contentType: response.ContentType,
        contentLength: response.ContentLength,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async headObject(key: string): Promise<ObjectHead | null> {
    const fullKey = this.getFullKey(key);

    try {
      const response = await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: fullKey,
        }),
      );

      return {
        size: response.ContentLength ?? 0,
        contentType: response.ContentType,
        etag: response.ETag,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async deleteObject(key: string): Promise<void> {
    const fullKey = this.getFullKey(key);

    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: fullKey,
      }),
    );

    this.logger.debug(`Object ${fullKey} deleted`);
  }

  private getFullKey(key: string): string {
    if (key.startsWith(this.prefix)) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchKey')
  );
}
