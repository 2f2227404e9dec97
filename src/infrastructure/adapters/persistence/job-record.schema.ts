import { z } from 'zod';
import { ExportJobEntity } from '../../../domain/entities/export-job.entity';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';

const dataQuerySchema = z
  .object({
    skip: z.number().optional(),
    take: z.number().optional(),
    keyword: z.string().optional(),
    objectIds: z.array(z.string()).optional(),
  })
  .passthrough();

const notificationSchema = z.object({
  id: z.string(),
  jobId: z.string(),
  notifyType: z.string(),
  creator: z.string(),
  title: z.string(),
  description: z.string(),
  status: z.nativeEnum(JobStatus),
  created: z.string(),
  finished: z.string().optional(),
  processedCount: z.number(),
  totalCount: z.number(),
  fileName: z.string().optional(),
  downloadUrl: z.string().optional(),
  errors: z.array(z.string()),
});

/**
 * Shape of a job item as stored in the jobs table
 */
export const jobRecordSchema = z.object({
  jobId: z.string(),
  request: z.object({
    exportTypeName: z.string(),
    dataQuery: dataQuerySchema,
    providerName: z.string().optional(),
    providerConfig: z.record(z.unknown()).optional(),
  }),
  userName: z.string(),
  status: z.nativeEnum(JobStatus),
  notification: notificationSchema,
  fileName: z.string().optional(),
  errorMessage: z.string().optional(),
  cancellationRequested: z.boolean().default(false),
  createdAt: z.string(),
  updatedAt: z.string(),
  ttl: z.number().optional(),
});

export function toJobEntity(item: unknown): ExportJobEntity {
  const { ttl: _ttl, ...job } = jobRecordSchema.parse(item);
  return job;
}
