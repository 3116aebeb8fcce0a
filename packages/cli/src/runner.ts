import type { AgentConfig, BudgetCallback, ExecutionTrace, RunResult } from '@budgetline/shared';
import { BudgetedExecutor, type TraceLogger } from '@budgetline/core';
import type { Manifest } from './manifest.js';
import { ManifestTask } from './manifest-task.js';

export interface ManifestRunOptions {
  /** Overrides from the command line; these win over the manifest. */
  budgetLimit?: number | null;
  costPer1000Tokens?: number;
  trackUsage?: boolean;
  tracer?: TraceLogger;
  onBudgetExceeded?: BudgetCallback;
}

export interface ManifestRun {
  result: RunResult;
  trace: ExecutionTrace | null;
}

/**
 * Queue every manifest task on a fresh executor and run them.
 * Settings resolve as command line, then manifest, then config.
 */
export function runManifest(
  manifest: Manifest,
  agent: AgentConfig,
  options: ManifestRunOptions = {},
): ManifestRun {
  const executor = BudgetedExecutor.fromConfig(
    {
      ...agent,
      name: manifest.agent.name ?? agent.name,
      budgetLimit: options.budgetLimit !== undefined
        ? options.budgetLimit
        : manifest.agent.budgetLimit !== undefined ? manifest.agent.budgetLimit : agent.budgetLimit,
      costPer1000Tokens: options.costPer1000Tokens ?? manifest.agent.costPer1000Tokens ?? agent.costPer1000Tokens,
      trackUsage: options.trackUsage ?? agent.trackUsage,
    },
    { tracer: options.tracer },
  );

  if (options.onBudgetExceeded) {
    executor.setBudgetCallback(options.onBudgetExceeded);
  }

  for (const entry of manifest.tasks) {
    executor.addTask(new ManifestTask(entry));
  }

  const result = executor.run();
  return { result, trace: executor.getLastTrace() };
}
