import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ConfigOverrides, RunConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = 'release.config.json';
export const DEFAULT_DELEGATE = ['python3', 'git_cherry_picker.py'];
export const DEFAULT_TASK_FILE = 'tasks.txt';

// Not trimmed: values reach the delegate verbatim.
const nonEmpty = z.string().refine((value) => value.trim().length > 0, 'must not be empty');
const command = z.array(nonEmpty).min(1, 'must name a command');

const TaskSyncSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('command'), command }),
  z.object({ type: z.literal('github'), owner: nonEmpty, repo: nonEmpty }),
]);

export const RunConfigSchema = z.object({
  releaseVersion: nonEmpty,
  sourceBranch: nonEmpty,
  targetBranch: nonEmpty,
  taskFile: nonEmpty.default(DEFAULT_TASK_FILE),
  repoPaths: z.array(nonEmpty).default([]),
  delegate: command.default(DEFAULT_DELEGATE),
  locale: z.enum(['en', 'ru']).default('en'),
  failurePolicy: z.enum(['continue', 'fail-fast']).default('continue'),
  install: command.optional(),
  taskSync: TaskSyncSchema.optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

async function readConfigFile(configPath: string, required: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (missing && !required) {
      return {};
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${reason}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${reason}`);
  }
}

function applyOverrides(raw: unknown, overrides: ConfigOverrides): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return { ...raw, ...defined };
}

/**
 * Validates a raw configuration value and returns a frozen RunConfig.
 * `source` only labels error messages.
 */
export function parseRunConfig(raw: unknown, source = 'configuration'): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path.length ? issue.path.join('.') : '(root)';
      return `${field}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}:\n  ${issues.join('\n  ')}`);
  }

  const { repoPaths, delegate, install, taskSync, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    repoPaths: Object.freeze([...repoPaths]),
    delegate: Object.freeze([...delegate]),
    ...(install ? { install: Object.freeze([...install]) } : {}),
    ...(taskSync ? { taskSync: Object.freeze(taskSync) } : {}),
  });
}

export async function loadRunConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  overrides: ConfigOverrides = {},
  required = false,
): Promise<RunConfig> {
  const raw = await readConfigFile(configPath, required);
  return parseRunConfig(applyOverrides(raw, overrides), configPath);
}
