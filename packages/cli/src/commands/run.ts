import { Command } from 'commander';
import { ConfigManager, TraceLogger, toWireRunResult } from '@budgetline/core';
import { ConfigError, logLevelSchema, type LogLevel } from '@budgetline/shared';
import { loadManifest } from '../manifest.js';
import { runManifest } from '../runner.js';
import { formatCost, formatRunResult, formatTraceEvent } from '../output/formatter.js';

interface RunCommandOptions {
  config?: string;
  budgetLimit?: number;
  costPer1k?: number;
  trackUsage: boolean;
  logLevel?: string;
  trace?: boolean;
  json?: boolean;
}

/** Commander keeps parsed option values on the instance, so each program builds its own. */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run a task manifest under a cost budget')
    .argument('<manifest>', 'YAML or JSON task manifest')
    .option('-c, --config <path>', 'Config file path')
    .option('--budget-limit <usd>', 'Cost ceiling in USD', parseFloat)
    .option('--cost-per-1k <usd>', 'USD per 1,000 tokens', parseFloat)
    .option('--no-track-usage', 'Do not record token usage')
    .option('--log-level <level>', 'Log level: debug, info, warn, error')
    .option('--trace', 'Print full execution trace')
    .option('--json', 'Output as JSON')
    .action(async (manifestPath: string, options: RunCommandOptions) => {
      const config = await new ConfigManager().load({ configPath: options.config });
      const level = resolveLogLevel(options.logLevel, config.logging.level);
      const tracer = new TraceLogger({
        level,
        sink: (event) => process.stderr.write(`${formatTraceEvent(event)}\n`),
      });

      const manifest = await loadManifest(manifestPath);
      const { result, trace } = runManifest(manifest, config.agent, {
        budgetLimit: options.budgetLimit,
        costPer1000Tokens: options.costPer1k,
        trackUsage: options.trackUsage ? undefined : false,
        tracer,
        onBudgetExceeded: (usage) => {
          process.stderr.write(`Budget exceeded! Total cost: ${formatCost(usage.estimatedCost)}\n`);
        },
      });

      if (options.json) {
        console.log(JSON.stringify(toWireRunResult(result), null, 2));
      } else {
        console.log(formatRunResult(result));
      }

      if (options.trace && trace) {
        console.log('');
        console.log('--- Execution Trace ---');
        console.log(JSON.stringify(trace, null, 2));
      }
    });
}

function resolveLogLevel(flag: string | undefined, configured: LogLevel): LogLevel {
  if (flag === undefined) return configured;
  const parsed = logLevelSchema.safeParse(flag);
  if (!parsed.success) {
    throw new ConfigError(`Unknown log level: ${flag}`);
  }
  return parsed.data;
}
