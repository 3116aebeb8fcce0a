import type { TokenCounts, UsageSnapshot } from './usage.js';

export type OutputFormat = 'json' | 'text' | 'structured';

export interface TaskConfig {
  readonly taskId: string;
  readonly description: string;
  readonly maxTokens: number;
  readonly temperature: number;
  /** Optional per-task cost ceiling, applied on top of the executor's limit. */
  readonly budgetLimit?: number;
  readonly outputFormat: OutputFormat;
}

export type TaskParameters = Record<string, unknown>;

/**
 * A unit of work run by a BudgetedExecutor.
 *
 * `execute` must be safe to call any number of times and may not rely on a
 * previous call having happened. `validate` is consulted when the task is
 * queued with `addTask`; `validateInput` when it is run through
 * `executeTask`.
 */
export interface Task<TParams = TaskParameters, TOutput = unknown> {
  readonly config: TaskConfig;
  validate?(): boolean;
  validateInput?(parameters: TParams): boolean;
  execute(parameters: TParams): TOutput;
  /** Actual token usage for an output, when the task knows it. */
  measureUsage?(output: TOutput): TokenCounts | undefined;
}

export type TaskOutcome =
  | { taskId: string; status: 'success'; output: unknown }
  | { taskId: string; status: 'failed'; error: string };

export type RunStatus = 'completed' | 'halted';

export interface RunResult {
  agentName: string;
  status: RunStatus;
  results: TaskOutcome[];
  usage: UsageSnapshot;
}

export interface TaskExecutionResult<TOutput = unknown> {
  status: 'success' | 'error';
  result?: TOutput;
  message?: string;
  usage: UsageSnapshot;
  withinBudget?: boolean;
}

export type BudgetCallback = (usage: UsageSnapshot) => void;
