import type { RunResult, TraceEvent, UsageSnapshot } from '@budgetline/shared';

export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

export function formatRunResult(run: RunResult): string {
  const lines: string[] = [];

  lines.push('');
  if (run.status === 'completed') {
    lines.push(`[OK] Agent "${run.agentName}" completed`);
  } else {
    lines.push(`[BUDGET EXCEEDED] Agent "${run.agentName}" stopped`);
  }

  const succeeded = run.results.filter(r => r.status === 'success').length;
  lines.push(`  Tasks: ${succeeded} succeeded, ${run.results.length - succeeded} failed`);
  for (const outcome of run.results) {
    if (outcome.status === 'success') {
      lines.push(`  [OK] ${outcome.taskId}`);
    } else {
      lines.push(`  [FAIL] ${outcome.taskId}: ${outcome.error}`);
    }
  }

  lines.push('');
  lines.push(formatUsageSummary(run.usage));

  return lines.join('\n');
}

export function formatUsageSummary(usage: UsageSnapshot): string {
  const lines: string[] = [];
  lines.push('--- Usage Summary ---');
  lines.push(`Tokens:  ${usage.totalTokens} (${usage.promptTokens} prompt / ${usage.completionTokens} completion)`);
  lines.push(`Calls:   ${usage.callCount}`);
  lines.push(`Cost:    ${formatCost(usage.estimatedCost)}`);
  if (usage.budgetLimit === null || usage.budgetRemaining === null) {
    lines.push('Budget:  unlimited');
  } else {
    lines.push(`Budget:  ${formatCost(usage.budgetLimit)} limit, ${formatCost(usage.budgetRemaining)} remaining`);
  }
  return lines.join('\n');
}

/** One line per trace event, for the stderr log sink. */
export function formatTraceEvent(event: TraceEvent): string {
  const data = Object.keys(event.data).length > 0 ? ` ${JSON.stringify(event.data)}` : '';
  return `[${event.level.toUpperCase()}] ${event.type}${data}`;
}
