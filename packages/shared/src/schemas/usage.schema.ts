import { z } from 'zod';

export const tokenCountsSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
});

export const wireUsageSchema = z.object({
  total_tokens: z.number().int().nonnegative(),
  prompt_tokens: z.number().int().nonnegative().optional(),
  completion_tokens: z.number().int().nonnegative().optional(),
  estimated_cost: z.number().nonnegative(),
  calls: z.number().int().nonnegative(),
  budget_limit: z.number().nonnegative().nullable(),
  budget_remaining: z.number().nullable(),
});

export type WireUsage = z.infer<typeof wireUsageSchema>;
