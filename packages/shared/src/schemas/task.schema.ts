import { z } from 'zod';
import { DEFAULT_TASK_SETTINGS } from '../constants.js';

export const outputFormatSchema = z.enum(['json', 'text', 'structured']);

export const taskConfigSchema = z.object({
  taskId: z.string().min(1),
  description: z.string(),
  maxTokens: z.number().int().positive().default(DEFAULT_TASK_SETTINGS.maxTokens),
  temperature: z.number().min(0).max(2).default(DEFAULT_TASK_SETTINGS.temperature),
  budgetLimit: z.number().nonnegative().optional(),
  outputFormat: outputFormatSchema.default(DEFAULT_TASK_SETTINGS.outputFormat),
});

export type TaskConfigInput = z.input<typeof taskConfigSchema>;
