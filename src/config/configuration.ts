/**
 * Application Configuration Module
 *
 * Central configuration management for the export service.
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const storage = this.configService.get('storage', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type StorageDriver = 'local' | 's3';

/**
 * Application configuration interface.
 *
 * Organized by concern (aws, sqs, storage, ...) rather than by environment variable.
 */
export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    exportJobsUrl: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  dynamodb: {
    tableName: string;
    jobTtlDays: number;
  };
  /**
   * Export file storage.
   *
   * ### driver (Environment: EXPORT_STORAGE_DRIVER)
   * - `local`: files live under `root` on the container filesystem
   * - `s3`: files live in `bucketName` under `prefix`
   *
   * ### downloadBasePath (Environment: EXPORT_DOWNLOAD_BASE_PATH)
   * - Prefix used to build the `downloadUrl` carried by completed notifications
   */
  storage: {
    driver: StorageDriver;
    root: string;
    bucketName?: string;
    prefix: string;
    downloadBasePath: string;
  };
  /**
   * Background job execution.
   *
   * ### maxConcurrentJobs (Environment: MAX_CONCURRENT_JOBS)
   * - Number of export jobs a single instance runs at the same time
   * - Each running job holds one data source cursor and one open file writer
   */
  jobs: {
    maxConcurrentJobs: number;
  };
}

export function buildConfiguration(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      exportJobsUrl: env.SQS_EXPORT_JOBS_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
      jobTtlDays: env.JOB_TTL_DAYS,
    },
    storage: {
      driver: env.EXPORT_STORAGE_DRIVER,
      root: env.EXPORT_STORAGE_ROOT,
      bucketName: env.S3_BUCKET_NAME,
      prefix: env.S3_PREFIX,
      downloadBasePath: env.EXPORT_DOWNLOAD_BASE_PATH.replace(/\/+$/, ''),
    },
    jobs: {
      maxConcurrentJobs: env.MAX_CONCURRENT_JOBS,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfiguration(validateEnv(process.env));
