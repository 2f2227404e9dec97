import { z } from 'zod';

export const ExportJobMessageSchema = z.object({
  jobId: z.string().min(1),
  exportTypeName: z.string().min(1),
  enqueuedAt: z.string().datetime().optional(),
});

export type ExportJobMessageDto = z.infer<typeof ExportJobMessageSchema>;
