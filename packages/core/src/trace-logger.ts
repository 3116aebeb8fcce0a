import {
  generateId,
  monotonicNow,
  isoNow,
  type LogLevel,
  type TraceEvent,
  type TraceSpan,
  type TraceSink,
  type ExecutionTrace,
  type TraceEventType,
  type UsageSnapshot,
} from '@budgetline/shared';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const EVENT_LEVELS: Record<TraceEventType, LogLevel> = {
  budget_check: 'debug',
  task_started: 'debug',
  usage_logged: 'info',
  task_completed: 'info',
  info: 'info',
  budget_halt: 'warn',
  task_rejected: 'warn',
  task_failed: 'error',
  error: 'error',
};

export interface TraceLoggerOptions {
  /** Minimum level forwarded to the sink. Defaults to 'info'. */
  level?: LogLevel;
  sink?: TraceSink;
}

export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private readonly level: LogLevel;
  private readonly sink?: TraceSink;

  constructor(options: TraceLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink;
  }

  createTrace(traceId: string, agentName: string, budgetLimit: number | null): void {
    this.traces.set(traceId, {
      traceId,
      agentName,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      budgetLimit,
      events: [],
      spans: [],
      spanStack: [],
      sinkFailures: 0,
    });
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);

    if (data) {
      this.logEvent(traceId, 'task_started', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): TraceEvent {
    const state = this.getState(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      level: EVENT_LEVELS[type],
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const span = event.parentSpanId ? this.findSpan(state.spans, event.parentSpanId) : undefined;
    if (span) {
      span.events.push(event);
    } else {
      state.events.push(event);
    }

    if (this.sink && LEVEL_RANK[event.level] >= LEVEL_RANK[this.level]) {
      try {
        this.sink(event);
      } catch {
        // Counted, never raised.
        state.sinkFailures += 1;
      }
    }
    return event;
  }

  logUsage(traceId: string, label: string, usage: UsageSnapshot): void {
    this.logEvent(traceId, 'usage_logged', {
      label,
      totalTokens: usage.totalTokens,
      estimatedCost: usage.estimatedCost,
      calls: usage.callCount,
      budgetRemaining: usage.budgetRemaining,
    });
  }

  logBudgetCheck(traceId: string, limit: number | null, exceeded: boolean, usage: UsageSnapshot): void {
    this.logEvent(traceId, 'budget_check', {
      limit,
      exceeded,
      estimatedCost: usage.estimatedCost,
    });
  }

  /** Finish a trace and drop its in-memory state. */
  getTrace(traceId: string, usage: UsageSnapshot): ExecutionTrace {
    const state = this.getState(traceId);
    const trace: ExecutionTrace = {
      traceId: state.traceId,
      agentName: state.agentName,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      budget: {
        limit: state.budgetLimit,
        used: usage,
      },
      events: state.events,
      spans: state.spans,
      sinkFailures: state.sinkFailures,
    };

    this.traces.delete(traceId);
    return trace;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  agentName: string;
  startedAt: string;
  startTime: number;
  budgetLimit: number | null;
  events: TraceEvent[];
  spans: TraceSpan[];
  spanStack: string[];
  sinkFailures: number;
}
