import { z } from 'zod';

export const exportDataQuerySchema = z
  .object({
    skip: z.number().int().min(0).optional(),
    take: z.number().int().min(1).optional(),
    keyword: z.string().optional(),
    objectIds: z.array(z.string()).optional(),
  })
  .passthrough();

export const exportDataRequestSchema = z.object({
  exportTypeName: z.string().trim().min(1, 'exportTypeName is required'),
  dataQuery: exportDataQuerySchema.default({}),
  providerName: z.string().trim().min(1).optional(),
  providerConfig: z.record(z.unknown()).optional(),
});

export type ExportDataRequestDto = z.infer<typeof exportDataRequestSchema>;

export const exportCancellationRequestSchema = z.object({
  jobId: z.string().trim().min(1, 'jobId is required'),
});

export type ExportCancellationRequestDto = z.infer<typeof exportCancellationRequestSchema>;
