import {
  type RunResult,
  type TaskExecutionResult,
  type TaskOutcome,
  type UsageSnapshot,
  type WireExecutionResult,
  type WireRunResult,
  type WireTaskOutcome,
  type WireUsage,
  BudgetlineError,
  wireExecutionResultSchema,
  wireRunResultSchema,
} from '@budgetline/shared';

/** The usage block of the external result shape. History is not carried. */
export function toWireUsage(usage: UsageSnapshot): WireUsage {
  return {
    total_tokens: usage.totalTokens,
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    estimated_cost: usage.estimatedCost,
    calls: usage.callCount,
    budget_limit: usage.budgetLimit,
    budget_remaining: usage.budgetRemaining,
  };
}

export function fromWireUsage(wire: WireUsage): UsageSnapshot {
  const completionTokens = wire.completion_tokens ?? wire.total_tokens - (wire.prompt_tokens ?? wire.total_tokens);
  const promptTokens = wire.prompt_tokens ?? wire.total_tokens - completionTokens;
  return Object.freeze({
    promptTokens,
    completionTokens,
    totalTokens: wire.total_tokens,
    estimatedCost: wire.estimated_cost,
    callCount: wire.calls,
    budgetLimit: wire.budget_limit,
    budgetRemaining: wire.budget_remaining,
    history: Object.freeze([]),
  });
}

function toWireOutcome(outcome: TaskOutcome): WireTaskOutcome {
  return outcome.status === 'success'
    ? { task_id: outcome.taskId, status: 'success', output: outcome.output }
    : { task_id: outcome.taskId, status: 'failed', error: outcome.error };
}

function fromWireOutcome(wire: WireTaskOutcome): TaskOutcome {
  return wire.status === 'success'
    ? { taskId: wire.task_id, status: 'success', output: wire.output }
    : { taskId: wire.task_id, status: 'failed', error: wire.error };
}

export function toWireRunResult(run: RunResult): WireRunResult {
  return {
    agent: run.agentName,
    status: run.status,
    results: run.results.map(toWireOutcome),
    usage: toWireUsage(run.usage),
  };
}

/** Validate a parsed JSON value and rebuild the RunResult it describes. */
export function fromWireRunResult(value: unknown): RunResult {
  const parsed = wireRunResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new BudgetlineError(
      `Invalid run result: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  const wire = parsed.data;
  return {
    agentName: wire.agent,
    status: wire.status,
    results: wire.results.map(fromWireOutcome),
    usage: fromWireUsage(wire.usage),
  };
}

export function toWireExecutionResult(result: TaskExecutionResult): WireExecutionResult {
  const wire: WireExecutionResult = {
    status: result.status,
    usage: toWireUsage(result.usage),
  };
  if (result.status === 'success') wire.result = result.result;
  if (result.message !== undefined) wire.message = result.message;
  if (result.withinBudget !== undefined) wire.within_budget = result.withinBudget;
  return wire;
}

export function fromWireExecutionResult(value: unknown): TaskExecutionResult {
  const parsed = wireExecutionResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new BudgetlineError(
      `Invalid execution result: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  const wire = parsed.data;
  const result: TaskExecutionResult = { status: wire.status, usage: fromWireUsage(wire.usage) };
  if (wire.status === 'success') result.result = wire.result;
  if (wire.message !== undefined) result.message = wire.message;
  if (wire.within_budget !== undefined) result.withinBudget = wire.within_budget;
  return result;
}
