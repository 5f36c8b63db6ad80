import { z } from 'zod';

export const ScanProfileSchema = z.enum(['quick', 'web', 'standard', 'full']);

// Inbound scan request. Port ranges and timeout bounds are checked by
// NetworkDiagnostics and come back as InvalidInput.
export const ScanRequestSchema = z.object({
  hostInput: z.string(),
  ports: z.array(z.number().int()).optional(),
  perPortTimeoutMs: z.number().int().optional(),
  totalBudgetMs: z.number().int().optional(),
});

export type ScanRequestBody = z.infer<typeof ScanRequestSchema>;
