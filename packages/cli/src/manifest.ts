import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import {
  ConfigError,
  outputFormatSchema,
  tokenCountsSchema,
} from '@budgetline/shared';

export const manifestTaskSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  budgetLimit: z.number().nonnegative().optional(),
  outputFormat: outputFormatSchema.optional(),
  /** Token usage to record when the task succeeds. */
  usage: tokenCountsSchema.optional(),
  output: z.unknown().optional(),
  /** Makes the task throw with this message. */
  fail: z.string().optional(),
});

export const manifestSchema = z.object({
  agent: z.object({
    name: z.string().min(1).optional(),
    budgetLimit: z.number().nonnegative().nullable().optional(),
    costPer1000Tokens: z.number().nonnegative().finite().optional(),
  }).default({}),
  tasks: z.array(manifestTaskSchema).min(1),
});

export type ManifestTaskEntry = z.infer<typeof manifestTaskSchema>;
export type Manifest = z.infer<typeof manifestSchema>;

export function parseManifest(content: string, format: 'yaml' | 'json'): Manifest {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Could not parse manifest: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid manifest: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

export async function loadManifest(path: string): Promise<Manifest> {
  const content = await readFile(path, 'utf-8');
  return parseManifest(content, path.endsWith('.json') ? 'json' : 'yaml');
}
