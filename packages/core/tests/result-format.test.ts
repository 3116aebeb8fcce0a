import { describe, it, expect } from 'vitest';
import { BudgetlineError, type RunResult } from '@budgetline/shared';
import { UsageTracker } from '../src/usage-tracker.js';
import { BudgetedExecutor } from '../src/budgeted-executor.js';
import {
  fromWireExecutionResult,
  fromWireRunResult,
  fromWireUsage,
  toWireExecutionResult,
  toWireRunResult,
  toWireUsage,
} from '../src/result-format.js';

function sampleRun(): RunResult {
  const tracker = new UsageTracker({ budgetLimit: 5 });
  tracker.logUsage(600, 400, 1, 'extract');
  return {
    agentName: 'reporter',
    status: 'halted',
    results: [
      { taskId: 'extract', status: 'success', output: { rows: [1, 2, 3] } },
      { taskId: 'load', status: 'failed', error: 'disk full' },
    ],
    usage: tracker.snapshot(),
  };
}

describe('result format', () => {
  it('writes usage with snake_case keys', () => {
    expect(toWireUsage(sampleRun().usage)).toEqual({
      total_tokens: 1000,
      prompt_tokens: 600,
      completion_tokens: 400,
      estimated_cost: 1,
      calls: 1,
      budget_limit: 5,
      budget_remaining: 4,
    });
  });

  it('writes a run result', () => {
    const wire = toWireRunResult(sampleRun());
    expect(wire.agent).toBe('reporter');
    expect(wire.status).toBe('halted');
    expect(wire.results).toEqual([
      { task_id: 'extract', status: 'success', output: { rows: [1, 2, 3] } },
      { task_id: 'load', status: 'failed', error: 'disk full' },
    ]);
  });

  it('reads back what it writes through JSON', () => {
    const run = sampleRun();
    const restored = fromWireRunResult(JSON.parse(JSON.stringify(toWireRunResult(run))));

    expect(restored.agentName).toBe(run.agentName);
    expect(restored.status).toBe(run.status);
    expect(restored.results).toEqual(run.results);
    expect(toWireUsage(restored.usage)).toEqual(toWireUsage(run.usage));
    expect(restored.usage.history).toEqual([]);
  });

  it('rejects a malformed run result', () => {
    expect(() => fromWireRunResult({ agent: 'x', status: 'exploded', results: [], usage: {} }))
      .toThrow(BudgetlineError);
    expect(() => fromWireRunResult('nope')).toThrow(/^Invalid run result: /);
  });

  it('derives missing token splits from the total', () => {
    const usage = fromWireUsage({
      total_tokens: 150,
      prompt_tokens: 100,
      estimated_cost: 0.0003,
      calls: 1,
      budget_limit: null,
      budget_remaining: null,
    });
    expect(usage.promptTokens).toBe(100);
    expect(usage.completionTokens).toBe(50);

    const totalsOnly = fromWireUsage({
      total_tokens: 150,
      estimated_cost: 0.0003,
      calls: 1,
      budget_limit: null,
      budget_remaining: null,
    });
    expect(totalsOnly.promptTokens).toBe(150);
    expect(totalsOnly.completionTokens).toBe(0);
  });

  it('writes single-task results', () => {
    const executor = new BudgetedExecutor({ name: 'a', budgetLimit: 0 });
    const usage = executor.getUsage();

    expect(toWireExecutionResult({ status: 'error', message: 'Budget limit exceeded', withinBudget: false, usage }))
      .toEqual({
        status: 'error',
        message: 'Budget limit exceeded',
        within_budget: false,
        usage: {
          total_tokens: 0,
          prompt_tokens: 0,
          completion_tokens: 0,
          estimated_cost: 0,
          calls: 0,
          budget_limit: 0,
          budget_remaining: 0,
        },
      });

    const success = toWireExecutionResult({ status: 'success', result: 'done', withinBudget: true, usage });
    expect(success.result).toBe('done');
    expect(success.message).toBeUndefined();
    expect(success.within_budget).toBe(true);
  });

  it('reads back a single-task result', () => {
    const executor = new BudgetedExecutor({ name: 'a', budgetLimit: 5, costPer1000Tokens: 1 });
    executor.executeTask(
      { config: { taskId: 't', description: 'd', maxTokens: 100, temperature: 0, outputFormat: 'json' }, execute: () => 1 },
      true,
      {},
      { promptTokens: 600, completionTokens: 400 },
    );
    const usage = executor.getUsage();
    const wire = JSON.parse(JSON.stringify(
      toWireExecutionResult({ status: 'success', result: { n: 1 }, withinBudget: true, usage }),
    ));

    const restored = fromWireExecutionResult(wire);

    expect(restored.status).toBe('success');
    expect(restored.result).toEqual({ n: 1 });
    expect(restored.withinBudget).toBe(true);
    expect(restored.message).toBeUndefined();
    expect(toWireUsage(restored.usage)).toEqual(toWireUsage(usage));
  });

  it('rejects a malformed single-task result', () => {
    expect(() => fromWireExecutionResult({ status: 'maybe', usage: {} })).toThrow(/^Invalid execution result: /);
  });
});
