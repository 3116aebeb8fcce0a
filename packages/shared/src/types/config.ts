import type { LogLevel } from './trace.js';
import type { TokenCounts } from './usage.js';

export interface AgentConfig {
  name: string;
  budgetLimit: number | null;
  costPer1000Tokens: number;
  trackUsage: boolean;
  defaultUsage: TokenCounts;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface BudgetlineConfig {
  agent: AgentConfig;
  logging: LoggingConfig;
}
