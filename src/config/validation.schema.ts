import { z } from 'zod';

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // AWS
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

    // SQS
    SQS_EXPORT_JOBS_URL: z.string().url(),
    SQS_WAIT_TIME_SECONDS: z.coerce.number().min(0).max(20).default(20),
    SQS_VISIBILITY_TIMEOUT: z.coerce.number().min(0).max(43200).default(900),

    // DynamoDB
    DYNAMODB_TABLE_NAME: z.string().default('export-jobs'),
    JOB_TTL_DAYS: z.coerce.number().min(1).default(7),

    // Export file storage
    EXPORT_STORAGE_DRIVER: z.enum(['local', 's3']).default('local'),
    EXPORT_STORAGE_ROOT: z.string().default('/tmp/exports'),
    S3_BUCKET_NAME: z.string().optional(),
    S3_PREFIX: z.string().default('exports/'),
    EXPORT_DOWNLOAD_BASE_PATH: z.string().default('/api/export/download'),

    // Job execution
    MAX_CONCURRENT_JOBS: z.coerce.number().min(1).max(10).default(4),
  })
  .superRefine((env, ctx) => {
    if (env.EXPORT_STORAGE_DRIVER === 's3' && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'Required when EXPORT_STORAGE_DRIVER is s3',
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
