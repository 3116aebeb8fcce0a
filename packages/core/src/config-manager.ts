import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type BudgetlineConfig,
  DEFAULT_CONFIG,
  budgetlineConfigSchema,
  ConfigError,
} from '@budgetline/shared';

export const CONFIG_FILE_NAMES = ['budgetline.config.yaml', 'budgetline.config.yml', 'budgetline.config.json'];

export const CONFIG_ENV_VARS = [
  'BUDGETLINE_AGENT_NAME',
  'BUDGETLINE_BUDGET_LIMIT',
  'BUDGETLINE_COST_PER_1K',
  'BUDGETLINE_TRACK_USAGE',
  'BUDGETLINE_LOG_LEVEL',
];

type ConfigRecord = Record<string, unknown>;

export class ConfigManager {
  private config: BudgetlineConfig = DEFAULT_CONFIG;

  async load(options?: {
    configPath?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
  }): Promise<BudgetlineConfig> {
    // 1. Start with defaults
    let merged: ConfigRecord = toRecord(structuredClone(DEFAULT_CONFIG));

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options?.configPath, options?.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, this.loadEnvVars(options?.env ?? process.env));

    // 4. Validate
    this.config = parseConfig(merged);
    return this.config;
  }

  get<K extends keyof BudgetlineConfig>(key: K): BudgetlineConfig[K] {
    return this.config[key];
  }

  getAll(): BudgetlineConfig {
    return this.config;
  }

  set(overrides: { [K in keyof BudgetlineConfig]?: Partial<BudgetlineConfig[K]> }): void {
    this.config = parseConfig(deepMerge(toRecord(structuredClone(this.config)), toRecord(overrides)));
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<ConfigRecord | null> {
    if (configPath) {
      if (existsSync(configPath)) {
        return this.parseConfigFile(configPath);
      }
      throw new ConfigError(`Config file not found: ${configPath}`);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<ConfigRecord> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Could not parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(env: NodeJS.ProcessEnv): ConfigRecord {
    const agent: ConfigRecord = {};

    if (env.BUDGETLINE_AGENT_NAME) {
      agent.name = env.BUDGETLINE_AGENT_NAME;
    }

    if (env.BUDGETLINE_BUDGET_LIMIT) {
      agent.budgetLimit = env.BUDGETLINE_BUDGET_LIMIT === 'none'
        ? null
        : parseFloat(env.BUDGETLINE_BUDGET_LIMIT);
    }

    if (env.BUDGETLINE_COST_PER_1K) {
      agent.costPer1000Tokens = parseFloat(env.BUDGETLINE_COST_PER_1K);
    }

    if (env.BUDGETLINE_TRACK_USAGE) {
      agent.trackUsage = env.BUDGETLINE_TRACK_USAGE === 'true';
    }

    const config: ConfigRecord = {};
    if (Object.keys(agent).length > 0) {
      config.agent = agent;
    }
    if (env.BUDGETLINE_LOG_LEVEL) {
      config.logging = { level: env.BUDGETLINE_LOG_LEVEL };
    }
    return config;
  }
}

function parseConfig(value: ConfigRecord): BudgetlineConfig {
  const result = budgetlineConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: object): ConfigRecord {
  return Object.fromEntries(Object.entries(value));
}

function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    if (isRecord(incoming) && isRecord(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
