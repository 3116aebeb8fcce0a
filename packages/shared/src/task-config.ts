import type { TaskConfig } from './types/task.js';
import { taskConfigSchema, type TaskConfigInput } from './schemas/task.schema.js';
import { TaskValidationError } from './utils/errors.js';

/**
 * Build a frozen TaskConfig, filling in the default token ceiling,
 * temperature and output format.
 */
export function createTaskConfig(input: TaskConfigInput): TaskConfig {
  const result = taskConfigSchema.safeParse(input);
  if (!result.success) {
    throw new TaskValidationError(
      input.taskId || '(unnamed)',
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return Object.freeze(result.data);
}
