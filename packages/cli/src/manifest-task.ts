import {
  type Task,
  type TaskConfig,
  type TaskParameters,
  type TokenCounts,
  createTaskConfig,
} from '@budgetline/shared';
import type { ManifestTaskEntry } from './manifest.js';

export interface ManifestTaskOutput {
  task_id: string;
  result: unknown;
  metadata: {
    output_format: string;
    temperature: number;
  };
}

const DEFAULT_RESULT = 'Task completed successfully';

/** A task whose behaviour is described entirely by a manifest entry. */
export class ManifestTask implements Task<TaskParameters, ManifestTaskOutput | string> {
  readonly config: TaskConfig;
  private readonly entry: ManifestTaskEntry;

  constructor(entry: ManifestTaskEntry) {
    this.entry = entry;
    this.config = createTaskConfig({
      taskId: entry.id,
      description: entry.description,
      maxTokens: entry.maxTokens,
      temperature: entry.temperature,
      budgetLimit: entry.budgetLimit,
      outputFormat: entry.outputFormat,
    });
  }

  validate(): boolean {
    return Boolean(this.config.taskId && this.config.description);
  }

  execute(parameters: TaskParameters): ManifestTaskOutput | string {
    if (this.entry.fail !== undefined) {
      throw new Error(this.entry.fail);
    }

    // An explicit null output is kept as is.
    const result = this.entry.output !== undefined ? this.entry.output : parameters.result ?? DEFAULT_RESULT;
    if (this.config.outputFormat === 'text') {
      return typeof result === 'string' ? result : JSON.stringify(result);
    }
    return {
      task_id: this.config.taskId,
      result,
      metadata: {
        output_format: this.config.outputFormat,
        temperature: this.config.temperature,
      },
    };
  }

  measureUsage(): TokenCounts | undefined {
    return this.entry.usage;
  }
}
