import {
  type Clock,
  type TokenCounts,
  type UsageCounters,
  type UsageEvent,
  type UsageSnapshot,
  InvalidUsageError,
  estimateCost,
  isoNow,
} from '@budgetline/shared';

export interface UsageTrackerOptions {
  budgetLimit?: number | null;
  clock?: Clock;
  /** Keep a per-call event log. Defaults to true. */
  recordHistory?: boolean;
}

export class UsageTracker {
  private counters: UsageCounters = {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    estimatedCost: 0,
    callCount: 0,
  };
  private history: UsageEvent[] = [];
  private readonly limit: number | null;
  private readonly clock: Clock;
  private readonly recordHistory: boolean;

  constructor(options: UsageTrackerOptions = {}) {
    this.limit = options.budgetLimit ?? null;
    this.clock = options.clock ?? isoNow;
    this.recordHistory = options.recordHistory ?? true;
  }

  get budgetLimit(): number | null {
    return this.limit;
  }

  logUsage(
    promptTokens: number,
    completionTokens: number,
    costPer1000Tokens: number,
    label = 'usage',
  ): UsageSnapshot {
    assertTokenCounts({ promptTokens, completionTokens });
    if (!Number.isFinite(costPer1000Tokens) || costPer1000Tokens < 0) {
      throw new InvalidUsageError('costPer1000Tokens', costPer1000Tokens, 'a non-negative number');
    }

    const tokens = promptTokens + completionTokens;
    const cost = estimateCost(tokens, costPer1000Tokens);

    this.counters.promptTokens += promptTokens;
    this.counters.completionTokens += completionTokens;
    this.counters.totalTokens = this.counters.promptTokens + this.counters.completionTokens;
    this.counters.estimatedCost += cost;
    this.counters.callCount += 1;

    if (this.recordHistory) {
      this.history.push(Object.freeze({ tokens, cost, label, timestamp: this.clock() }));
    }

    return this.snapshot();
  }

  /** A null or undefined limit is never exceeded. */
  isBudgetExceeded(budgetLimit: number | null | undefined = this.limit): boolean {
    if (budgetLimit === null || budgetLimit === undefined) return false;
    return this.counters.estimatedCost >= budgetLimit;
  }

  snapshot(): UsageSnapshot {
    return Object.freeze({
      ...this.counters,
      budgetLimit: this.limit,
      budgetRemaining: this.limit !== null ? this.limit - this.counters.estimatedCost : null,
      history: Object.freeze([...this.history]),
    });
  }
}

export function assertTokenCounts(counts: TokenCounts): void {
  for (const field of ['promptTokens', 'completionTokens'] as const) {
    const value = counts[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidUsageError(field, value);
    }
  }
}
