// Types
export type { TokenCounts, UsageEvent, UsageCounters, UsageSnapshot } from './types/usage.js';
export type {
  OutputFormat,
  TaskConfig,
  TaskParameters,
  Task,
  TaskOutcome,
  RunStatus,
  RunResult,
  TaskExecutionResult,
  BudgetCallback,
} from './types/task.js';
export type {
  LogLevel,
  TraceEventType,
  TraceEvent,
  TraceSpan,
  ExecutionTrace,
  TraceSink,
} from './types/trace.js';
export type { AgentConfig, LoggingConfig, BudgetlineConfig } from './types/config.js';

// Schemas
export { tokenCountsSchema, wireUsageSchema } from './schemas/usage.schema.js';
export type { WireUsage } from './schemas/usage.schema.js';
export { outputFormatSchema, taskConfigSchema } from './schemas/task.schema.js';
export type { TaskConfigInput } from './schemas/task.schema.js';
export {
  wireTaskOutcomeSchema,
  runStatusSchema,
  wireRunResultSchema,
  wireExecutionResultSchema,
} from './schemas/result.schema.js';
export type { WireTaskOutcome, WireRunResult, WireExecutionResult } from './schemas/result.schema.js';
export {
  logLevelSchema,
  agentConfigSchema,
  loggingConfigSchema,
  budgetlineConfigSchema,
} from './schemas/config.schema.js';

// Constants
export {
  DEFAULT_COST_PER_1K_TOKENS,
  DEFAULT_USAGE_ESTIMATE,
  DEFAULT_TASK_SETTINGS,
  DEFAULT_CONFIG,
} from './constants.js';

// Utils
export * from './utils/index.js';
export { createTaskConfig } from './task-config.js';
