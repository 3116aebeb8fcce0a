import { z } from 'zod';
import { tokenCountsSchema } from './usage.schema.js';
import { DEFAULT_COST_PER_1K_TOKENS, DEFAULT_USAGE_ESTIMATE } from '../constants.js';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const agentConfigSchema = z.object({
  name: z.string().min(1).default('agent'),
  budgetLimit: z.number().nonnegative().nullable().default(null),
  costPer1000Tokens: z.number().nonnegative().finite().default(DEFAULT_COST_PER_1K_TOKENS),
  trackUsage: z.boolean().default(true),
  defaultUsage: tokenCountsSchema.default(DEFAULT_USAGE_ESTIMATE),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const budgetlineConfigSchema = z.object({
  agent: agentConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
