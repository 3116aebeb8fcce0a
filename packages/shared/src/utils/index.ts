export { generateId } from './id.js';
export { monotonicNow, isoNow } from './clock.js';
export type { Clock } from './clock.js';
export { estimateCost } from './cost.js';
export {
  BudgetlineError,
  InvalidUsageError,
  TaskValidationError,
  TaskExecutionFault,
  ConfigError,
} from './errors.js';
