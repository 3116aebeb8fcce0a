import type { BudgetlineConfig } from './types/config.js';
import type { TokenCounts } from './types/usage.js';

export const DEFAULT_COST_PER_1K_TOKENS = 0.002;

/** Usage recorded for a successful task that reports none of its own. */
export const DEFAULT_USAGE_ESTIMATE: TokenCounts = {
  promptTokens: 100,
  completionTokens: 50,
};

export const DEFAULT_TASK_SETTINGS = {
  maxTokens: 1000,
  temperature: 0.7,
  outputFormat: 'json',
} as const;

export const DEFAULT_CONFIG: BudgetlineConfig = {
  agent: {
    name: 'agent',
    budgetLimit: null,
    costPer1000Tokens: DEFAULT_COST_PER_1K_TOKENS,
    trackUsage: true,
    defaultUsage: DEFAULT_USAGE_ESTIMATE,
  },
  logging: {
    level: 'info',
  },
};
