import {
  type AgentConfig,
  type BudgetCallback,
  type Clock,
  type ExecutionTrace,
  type OutputFormat,
  type RunResult,
  type RunStatus,
  type Task,
  type TaskConfig,
  type TaskExecutionResult,
  type TaskOutcome,
  type TaskParameters,
  type TokenCounts,
  type UsageSnapshot,
  ConfigError,
  TaskExecutionFault,
  TaskValidationError,
  agentConfigSchema,
  generateId,
  taskConfigSchema,
  tokenCountsSchema,
} from '@budgetline/shared';
import { UsageTracker, assertTokenCounts } from './usage-tracker.js';
import { TraceLogger } from './trace-logger.js';

export interface BudgetedExecutorOptions {
  name: string;
  /** Cost ceiling in USD. Null or absent means unlimited. */
  budgetLimit?: number | null;
  costPer1000Tokens?: number;
  /** Whether run/executeTask record usage unless told otherwise. */
  trackUsage?: boolean;
  /** Usage logged for a successful task that reports none. */
  defaultUsage?: TokenCounts;
  tracer?: TraceLogger;
  clock?: Clock;
}

export interface RunOptions {
  trackUsage?: boolean;
}

/** A task bound to the parameters it will be called with. */
interface WorkUnit<TOutput> {
  config: TaskConfig;
  invoke(): { output: TOutput; usage?: TokenCounts };
}

type StepResult<TOutput> =
  | { kind: 'halted' }
  | { kind: 'success'; output: TOutput }
  | { kind: 'failed'; error: string };

/**
 * Runs tasks one after another under a cost ceiling.
 *
 * Before each task the accumulated cost is compared with the ceiling; once it
 * is reached the run stops, the budget callback fires once, and the outcomes
 * gathered so far are returned. A task that throws is recorded as failed and
 * the run moves on.
 */
export class BudgetedExecutor {
  readonly name: string;
  private readonly tracker: UsageTracker;
  private readonly tracer: TraceLogger;
  private readonly costPer1000Tokens: number;
  private readonly trackUsage: boolean;
  private readonly defaultUsage: TokenCounts;
  private queue: WorkUnit<unknown>[] = [];
  private budgetCallback: BudgetCallback | null = null;
  private lastTrace: ExecutionTrace | null = null;

  constructor(options: BudgetedExecutorOptions) {
    const parsed = agentConfigSchema.safeParse({
      name: options.name,
      budgetLimit: options.budgetLimit,
      costPer1000Tokens: options.costPer1000Tokens,
      trackUsage: options.trackUsage,
      defaultUsage: options.defaultUsage,
    });
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid executor options: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    const config = parsed.data;
    this.name = config.name;
    this.costPer1000Tokens = config.costPer1000Tokens;
    this.trackUsage = config.trackUsage;
    this.defaultUsage = config.defaultUsage;
    this.tracker = new UsageTracker({ budgetLimit: config.budgetLimit, clock: options.clock });
    this.tracer = options.tracer ?? new TraceLogger();
  }

  static fromConfig(
    config: AgentConfig,
    extras: { tracer?: TraceLogger; clock?: Clock } = {},
  ): BudgetedExecutor {
    return new BudgetedExecutor({ ...config, ...extras });
  }

  get taskCount(): number {
    return this.queue.length;
  }

  addTask<TOutput>(task: Task<TaskParameters, TOutput>, parameters: TaskParameters = {}): void {
    const parsed = taskConfigSchema.safeParse(task.config);
    if (!parsed.success) {
      throw new TaskValidationError(
        task.config.taskId,
        parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      );
    }
    if (task.validate) {
      let valid = false;
      try {
        valid = task.validate();
      } catch (err) {
        throw new TaskValidationError(task.config.taskId, [`validate() threw: ${errorMessage(err)}`]);
      }
      if (!valid) throw new TaskValidationError(task.config.taskId);
    }
    this.queue.push(bind(task, parameters));
  }

  /** Replaces any earlier callback; pass null to clear it. */
  setBudgetCallback(callback: BudgetCallback | null): void {
    this.budgetCallback = callback;
  }

  run(options: RunOptions = {}): RunResult {
    const trackUsage = options.trackUsage ?? this.trackUsage;
    const traceId = generateId('run');
    this.tracer.createTrace(traceId, this.name, this.tracker.budgetLimit);

    try {
      this.tracer.logEvent(traceId, 'info', { message: 'Run started', agent: this.name, tasks: this.queue.length });

      const results: TaskOutcome[] = [];
      let status: RunStatus = 'completed';

      for (const unit of this.queue) {
        const step = this.step(unit, trackUsage, traceId);
        if (step.kind === 'halted') {
          status = 'halted';
          break;
        }
        const taskId = unit.config.taskId;
        results.push(step.kind === 'success'
          ? { taskId, status: 'success', output: step.output }
          : { taskId, status: 'failed', error: step.error });
      }

      return { agentName: this.name, status, results, usage: this.tracker.snapshot() };
    } finally {
      this.lastTrace = this.tracer.getTrace(traceId, this.tracker.snapshot());
    }
  }

  executeTask<TOutput>(
    task: Task<TaskParameters, TOutput>,
    trackUsage: boolean = this.trackUsage,
    parameters: TaskParameters = {},
    usage?: TokenCounts,
  ): TaskExecutionResult<TOutput> {
    if (usage) assertTokenCounts(usage);

    const traceId = generateId('exec');
    this.tracer.createTrace(traceId, this.name, this.tracker.budgetLimit);

    try {
      const result = this.executeSingle(traceId, task, trackUsage, parameters, usage);
      return { ...result, usage: this.tracker.snapshot() };
    } finally {
      this.lastTrace = this.tracer.getTrace(traceId, this.tracker.snapshot());
    }
  }

  getUsage(): UsageSnapshot {
    return this.tracker.snapshot();
  }

  isBudgetExceeded(): boolean {
    return this.tracker.isBudgetExceeded();
  }

  /** Trace of the most recent run or executeTask call. */
  getLastTrace(): ExecutionTrace | null {
    return this.lastTrace;
  }

  // ─── Private ────────────────────────────────────────────────────

  /** Checking → Executing → Recording for one unit of work. */
  private step<TOutput>(unit: WorkUnit<TOutput>, trackUsage: boolean, traceId: string): StepResult<TOutput> {
    const { config } = unit;
    const limit = this.effectiveLimit(config);
    const exceeded = this.tracker.isBudgetExceeded(limit);
    this.tracer.logBudgetCheck(traceId, limit, exceeded, this.tracker.snapshot());

    if (exceeded) {
      this.halt(traceId, config.taskId, limit);
      return { kind: 'halted' };
    }

    const spanId = this.tracer.startSpan(traceId, config.taskId, {
      taskId: config.taskId,
      description: config.description,
      outputFormat: config.outputFormat,
    });

    try {
      let invoked: { output: TOutput; usage?: TokenCounts };
      try {
        invoked = unit.invoke();
      } catch (err) {
        const fault = new TaskExecutionFault(config.taskId, err);
        this.tracer.logEvent(traceId, 'task_failed', { taskId: config.taskId, error: fault.reason });
        return { kind: 'failed', error: fault.reason };
      }

      const formatError = checkOutputFormat(config.outputFormat, invoked.output);
      if (formatError) {
        this.tracer.logEvent(traceId, 'task_failed', { taskId: config.taskId, error: formatError });
        return { kind: 'failed', error: formatError };
      }

      if (trackUsage) {
        let counts = this.fallbackUsage(config);
        if (invoked.usage) {
          const reported = tokenCountsSchema.safeParse(invoked.usage);
          if (!reported.success) {
            const error = `Invalid usage reported by task ${config.taskId}`;
            this.tracer.logEvent(traceId, 'task_failed', { taskId: config.taskId, error });
            return { kind: 'failed', error };
          }
          counts = reported.data;
        }
        const snapshot = this.tracker.logUsage(
          counts.promptTokens,
          counts.completionTokens,
          this.costPer1000Tokens,
          config.taskId,
        );
        this.tracer.logUsage(traceId, config.taskId, snapshot);
      }

      this.tracer.logEvent(traceId, 'task_completed', { taskId: config.taskId });
      return { kind: 'success', output: invoked.output };
    } finally {
      this.tracer.endSpan(traceId, spanId);
    }
  }

  private halt(traceId: string, taskId: string, limit: number | null): void {
    const usage = this.tracker.snapshot();
    this.tracer.logEvent(traceId, 'budget_halt', {
      message: 'Budget exceeded, stopping execution',
      taskId,
      limit,
      estimatedCost: usage.estimatedCost,
    });

    if (!this.budgetCallback) return;
    try {
      this.budgetCallback(usage);
    } catch (err) {
      this.tracer.logEvent(traceId, 'error', {
        message: 'Budget callback failed',
        error: errorMessage(err),
      });
    }
  }

  /** The executor's ceiling, lowered by the task's own when it has one. */
  private effectiveLimit(config: TaskConfig): number | null {
    const own = config.budgetLimit;
    const shared = this.tracker.budgetLimit;
    if (own === undefined) return shared;
    if (shared === null) return own;
    return Math.min(own, shared);
  }

  private fallbackUsage(config: TaskConfig): TokenCounts {
    return {
      promptTokens: this.defaultUsage.promptTokens,
      completionTokens: Math.min(this.defaultUsage.completionTokens, config.maxTokens),
    };
  }

  private executeSingle<TOutput>(
    traceId: string,
    task: Task<TaskParameters, TOutput>,
    trackUsage: boolean,
    parameters: TaskParameters,
    usage?: TokenCounts,
  ): Omit<TaskExecutionResult<TOutput>, 'usage'> {
    const rejection = this.checkSingleTask(task, parameters);
    if (rejection) {
      this.tracer.logEvent(traceId, 'task_rejected', { taskId: task.config.taskId, reason: rejection });
      return { status: 'error', message: rejection };
    }

    const step = this.step(bind(task, parameters, usage), trackUsage, traceId);
    if (step.kind === 'halted') {
      return { status: 'error', message: 'Budget limit exceeded', withinBudget: false };
    }

    const withinBudget = !this.tracker.isBudgetExceeded(this.effectiveLimit(task.config));
    if (step.kind === 'failed') {
      return { status: 'error', message: step.error, withinBudget };
    }
    return { status: 'success', result: step.output, withinBudget };
  }

  private checkSingleTask<TOutput>(task: Task<TaskParameters, TOutput>, parameters: TaskParameters): string | null {
    const parsed = taskConfigSchema.safeParse(task.config);
    if (!parsed.success) {
      return `Invalid task configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`;
    }
    if (!task.validateInput) return null;
    try {
      return task.validateInput(parameters) ? null : `Invalid input parameters for task ${task.config.taskId}`;
    } catch (err) {
      return `Invalid input parameters for task ${task.config.taskId}: ${errorMessage(err)}`;
    }
  }
}

function bind<TOutput>(
  task: Task<TaskParameters, TOutput>,
  parameters: TaskParameters,
  usage?: TokenCounts,
): WorkUnit<TOutput> {
  return {
    config: task.config,
    invoke: () => {
      const output = task.execute(parameters);
      return { output, usage: usage ?? task.measureUsage?.(output) };
    },
  };
}

/** Returns a failure message when an output does not fit its declared format. */
export function checkOutputFormat(format: OutputFormat, output: unknown): string | null {
  if (format === 'text') {
    return typeof output === 'string' ? null : `Expected text output, got ${kindOf(output)}`;
  }
  if (format === 'structured' && (typeof output !== 'object' || output === null)) {
    return `Expected structured output, got ${kindOf(output)}`;
  }
  try {
    if (JSON.stringify(output) === undefined) {
      return `Output is not JSON-serializable: ${kindOf(output)}`;
    }
  } catch (err) {
    return `Output is not JSON-serializable: ${errorMessage(err)}`;
  }
  return null;
}

function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
