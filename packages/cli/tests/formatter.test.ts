import { describe, it, expect } from 'vitest';
import type { RunResult, TraceEvent, UsageSnapshot } from '@budgetline/shared';
import { formatCost, formatRunResult, formatTraceEvent, formatUsageSummary } from '../src/output/formatter.js';

const usage: UsageSnapshot = {
  promptTokens: 600,
  completionTokens: 400,
  totalTokens: 1000,
  estimatedCost: 1,
  callCount: 1,
  budgetLimit: 1,
  budgetRemaining: 0,
  history: [],
};

describe('Formatting utilities', () => {
  describe('formatCost', () => {
    it('shows four decimal places', () => {
      expect(formatCost(0.0003)).toBe('$0.0003');
      expect(formatCost(1.5)).toBe('$1.5000');
      expect(formatCost(0)).toBe('$0.0000');
    });
  });

  describe('formatUsageSummary', () => {
    it('shows the remaining budget', () => {
      expect(formatUsageSummary(usage).split('\n')).toEqual([
        '--- Usage Summary ---',
        'Tokens:  1000 (600 prompt / 400 completion)',
        'Calls:   1',
        'Cost:    $1.0000',
        'Budget:  $1.0000 limit, $0.0000 remaining',
      ]);
    });

    it('marks an unset limit as unlimited', () => {
      const lines = formatUsageSummary({ ...usage, budgetLimit: null, budgetRemaining: null }).split('\n');
      expect(lines[4]).toBe('Budget:  unlimited');
    });
  });

  describe('formatRunResult', () => {
    it('lists outcomes of a halted run', () => {
      const run: RunResult = {
        agentName: 'demo',
        status: 'halted',
        results: [
          { taskId: 'a', status: 'success', output: {} },
          { taskId: 'b', status: 'failed', error: 'boom' },
        ],
        usage,
      };

      expect(formatRunResult(run).split('\n')).toEqual([
        '',
        '[BUDGET EXCEEDED] Agent "demo" stopped',
        '  Tasks: 1 succeeded, 1 failed',
        '  [OK] a',
        '  [FAIL] b: boom',
        '',
        '--- Usage Summary ---',
        'Tokens:  1000 (600 prompt / 400 completion)',
        'Calls:   1',
        'Cost:    $1.0000',
        'Budget:  $1.0000 limit, $0.0000 remaining',
      ]);
    });

    it('reports a completed run', () => {
      const run: RunResult = { agentName: 'demo', status: 'completed', results: [], usage };
      const lines = formatRunResult(run).split('\n');
      expect(lines[1]).toBe('[OK] Agent "demo" completed');
      expect(lines[2]).toBe('  Tasks: 0 succeeded, 0 failed');
    });
  });

  describe('formatTraceEvent', () => {
    const base: TraceEvent = {
      id: 'evt_1',
      traceId: 'run_1',
      type: 'budget_halt',
      level: 'warn',
      timestamp: 0,
      wallClock: '2026-01-01T00:00:00.000Z',
      data: { taskId: 'b' },
    };

    it('prints the level, type and data', () => {
      expect(formatTraceEvent(base)).toBe('[WARN] budget_halt {"taskId":"b"}');
    });

    it('omits empty data', () => {
      expect(formatTraceEvent({ ...base, type: 'info', level: 'info', data: {} })).toBe('[INFO] info');
    });
  });
});
