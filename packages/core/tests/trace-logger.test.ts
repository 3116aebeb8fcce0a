import { describe, it, expect } from 'vitest';
import type { TraceEvent } from '@budgetline/shared';
import { TraceLogger } from '../src/trace-logger.js';
import { UsageTracker } from '../src/usage-tracker.js';

describe('TraceLogger', () => {
  it('creates and retrieves a trace', () => {
    const logger = new TraceLogger();
    const usage = new UsageTracker({ budgetLimit: 0.5 }).snapshot();

    logger.createTrace('trace_1', 'agent_1', 0.5);
    const trace = logger.getTrace('trace_1', usage);

    expect(trace.traceId).toBe('trace_1');
    expect(trace.agentName).toBe('agent_1');
    expect(trace.budget.limit).toBe(0.5);
    expect(trace.budget.used).toEqual(usage);
    expect(trace.totalDurationMs).toBeGreaterThanOrEqual(0);
  });

  it('records spans and events', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_2', 'agent', null);

    const spanId = logger.startSpan('trace_2', 'test-span');
    logger.logEvent('trace_2', 'info', { message: 'hello' });
    logger.endSpan('trace_2', spanId);
    logger.logEvent('trace_2', 'info', { message: 'after' });

    const trace = logger.getTrace('trace_2', new UsageTracker().snapshot());

    expect(trace.spans).toHaveLength(1);
    expect(trace.spans[0].name).toBe('test-span');
    expect(trace.spans[0].endTime).toBeDefined();
    expect(trace.spans[0].events.map(e => e.data)).toEqual([{ message: 'hello' }]);
    expect(trace.events.map(e => e.data)).toEqual([{ message: 'after' }]);
  });

  it('nests spans opened inside another span', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_3', 'agent', null);

    const outer = logger.startSpan('trace_3', 'outer');
    const inner = logger.startSpan('trace_3', 'inner');
    logger.endSpan('trace_3', inner);
    logger.endSpan('trace_3', outer);

    const trace = logger.getTrace('trace_3', new UsageTracker().snapshot());
    expect(trace.spans.map(s => s.name)).toEqual(['outer']);
    expect(trace.spans[0].children.map(s => s.name)).toEqual(['inner']);
  });

  it('logs a task_started event when a span opens with data', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_4', 'agent', null);
    const spanId = logger.startSpan('trace_4', 'task_a', { taskId: 'task_a' });
    logger.endSpan('trace_4', spanId);

    const trace = logger.getTrace('trace_4', new UsageTracker().snapshot());
    expect(trace.spans[0].events).toHaveLength(1);
    expect(trace.spans[0].events[0].type).toBe('task_started');
    expect(trace.spans[0].events[0].parentSpanId).toBe(spanId);
  });

  it('assigns each event type its level', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_5', 'agent', null);
    expect(logger.logEvent('trace_5', 'budget_check', {}).level).toBe('debug');
    expect(logger.logEvent('trace_5', 'usage_logged', {}).level).toBe('info');
    expect(logger.logEvent('trace_5', 'budget_halt', {}).level).toBe('warn');
    expect(logger.logEvent('trace_5', 'task_failed', {}).level).toBe('error');
  });

  it('forwards only events at or above its level to the sink', () => {
    const seen: TraceEvent[] = [];
    const logger = new TraceLogger({ level: 'warn', sink: event => seen.push(event) });
    logger.createTrace('trace_6', 'agent', 1);

    logger.logEvent('trace_6', 'budget_check', { exceeded: false });
    logger.logEvent('trace_6', 'task_completed', { taskId: 'a' });
    logger.logEvent('trace_6', 'budget_halt', { taskId: 'b' });
    logger.logEvent('trace_6', 'error', { message: 'x' });

    expect(seen.map(e => e.type)).toEqual(['budget_halt', 'error']);
    expect(logger.getTrace('trace_6', new UsageTracker().snapshot()).events).toHaveLength(4);
  });

  it('counts sink failures instead of raising them', () => {
    const logger = new TraceLogger({
      sink: () => {
        throw new Error('sink down');
      },
    });
    logger.createTrace('trace_9', 'agent', null);

    const event = logger.logEvent('trace_9', 'info', { message: 'still recorded' });
    logger.logEvent('trace_9', 'budget_check', {});

    const trace = logger.getTrace('trace_9', new UsageTracker().snapshot());
    expect(trace.events).toEqual([event, expect.objectContaining({ type: 'budget_check' })]);
    expect(trace.sinkFailures).toBe(1);
  });

  it('summarises usage in usage_logged events', () => {
    const logger = new TraceLogger();
    const tracker = new UsageTracker({ budgetLimit: 5 });
    logger.createTrace('trace_7', 'agent', 5);
    logger.logUsage('trace_7', 'task_a', tracker.logUsage(600, 400, 1, 'task_a'));

    const [event] = logger.getTrace('trace_7', tracker.snapshot()).events;
    expect(event.type).toBe('usage_logged');
    expect(event.data).toEqual({
      label: 'task_a',
      totalTokens: 1000,
      estimatedCost: 1,
      calls: 1,
      budgetRemaining: 4,
    });
  });

  it('drops trace state once retrieved', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_8', 'agent', null);
    expect(logger.hasTrace('trace_8')).toBe(true);
    logger.getTrace('trace_8', new UsageTracker().snapshot());
    expect(logger.hasTrace('trace_8')).toBe(false);
    expect(() => logger.logEvent('trace_8', 'info', {})).toThrow('Trace not found: trace_8');
  });
});
