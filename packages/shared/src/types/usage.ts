export interface TokenCounts {
  promptTokens: number;
  completionTokens: number;
}

export interface UsageEvent {
  readonly tokens: number;
  readonly cost: number;
  /** What consumed the tokens: a task id or a model name. */
  readonly label: string;
  readonly timestamp: string;
}

export interface UsageCounters {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCost: number;
  callCount: number;
}

export interface UsageSnapshot extends Readonly<UsageCounters> {
  readonly budgetLimit: number | null;
  /** `budgetLimit - estimatedCost`, unclamped; null when no limit is set. */
  readonly budgetRemaining: number | null;
  readonly history: readonly UsageEvent[];
}
