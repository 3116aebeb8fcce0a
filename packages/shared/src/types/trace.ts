import type { UsageSnapshot } from './usage.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TraceEventType =
  | 'budget_check'
  | 'task_started'
  | 'usage_logged'
  | 'task_completed'
  | 'task_failed'
  | 'task_rejected'
  | 'budget_halt'
  | 'info'
  | 'error';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  level: LogLevel;
  timestamp: number;
  wallClock: string;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface ExecutionTrace {
  traceId: string;
  agentName: string;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  budget: {
    limit: number | null;
    used: UsageSnapshot;
  };
  /** Events logged outside any span. */
  events: TraceEvent[];
  spans: TraceSpan[];
  /** Events the sink threw on. */
  sinkFailures: number;
}

export type TraceSink = (event: TraceEvent) => void;
