import { z } from 'zod';

export const scopeOptionsSchema = z.object({
  capUsd: z.number().nonnegative().optional(),
  label: z.string().optional(),
  logUsage: z.boolean().optional(),
});
