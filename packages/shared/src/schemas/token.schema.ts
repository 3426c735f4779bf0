// ============================================================================
// Token Service — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

export const createSessionSchema = z.object({
  clientId: z.string().min(1).max(100),
  clientSecret: z.string().min(1).max(200),
});

export type CreateSession = z.infer<typeof createSessionSchema>;
