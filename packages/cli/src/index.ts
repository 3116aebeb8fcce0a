export { parseManifest, loadManifest, manifestSchema, manifestTaskSchema } from './manifest.js';
export type { Manifest, ManifestTaskEntry } from './manifest.js';
export { ManifestTask } from './manifest-task.js';
export type { ManifestTaskOutput } from './manifest-task.js';
export { runManifest } from './runner.js';
export type { ManifestRunOptions, ManifestRun } from './runner.js';
export { formatCost, formatRunResult, formatUsageSummary, formatTraceEvent } from './output/formatter.js';
export { createRunCommand } from './commands/run.js';
export { createConfigCommand } from './commands/config.js';
