import { z } from 'zod';
import { wireUsageSchema } from './usage.schema.js';

export const wireTaskOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    task_id: z.string(),
    status: z.literal('success'),
    output: z.unknown(),
  }),
  z.object({
    task_id: z.string(),
    status: z.literal('failed'),
    error: z.string(),
  }),
]);

export const runStatusSchema = z.enum(['completed', 'halted']);

export const wireRunResultSchema = z.object({
  agent: z.string(),
  status: runStatusSchema,
  results: z.array(wireTaskOutcomeSchema),
  usage: wireUsageSchema,
});

export const wireExecutionResultSchema = z.object({
  status: z.enum(['success', 'error']),
  result: z.unknown().optional(),
  message: z.string().optional(),
  usage: wireUsageSchema,
  within_budget: z.boolean().optional(),
});

export type WireTaskOutcome = z.infer<typeof wireTaskOutcomeSchema>;
export type WireRunResult = z.infer<typeof wireRunResultSchema>;
export type WireExecutionResult = z.infer<typeof wireExecutionResultSchema>;
