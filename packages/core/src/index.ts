export { UsageTracker, assertTokenCounts } from './usage-tracker.js';
export type { UsageTrackerOptions } from './usage-tracker.js';
export { BudgetedExecutor, checkOutputFormat } from './budgeted-executor.js';
export type { BudgetedExecutorOptions, RunOptions } from './budgeted-executor.js';
export { TraceLogger } from './trace-logger.js';
export type { TraceLoggerOptions } from './trace-logger.js';
export { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS } from './config-manager.js';
export {
  toWireUsage,
  fromWireUsage,
  toWireRunResult,
  fromWireRunResult,
  toWireExecutionResult,
  fromWireExecutionResult,
} from './result-format.js';
