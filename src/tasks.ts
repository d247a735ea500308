import { writeFile } from 'fs/promises';
import { GitHubClient } from './github.js';
import type { IssueSource } from './github.js';
import { runCommand } from './process.js';
import type { CommandRunner } from './process.js';
import type { Logger, RunConfig, TaskSyncConfig } from './types.js';

export class PrepareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrepareError';
  }
}

export interface TaskSyncDeps {
  runner?: CommandRunner;
  issueSource?: (sync: Extract<TaskSyncConfig, { type: 'github' }>) => IssueSource;
  logger: Logger;
}

export async function writeTaskFile(taskFile: string, keys: readonly string[]): Promise<void> {
  const content = keys.length ? `${keys.join('\n')}\n` : '';
  await writeFile(taskFile, content, 'utf-8');
}

/**
 * Produces the task list for `config.releaseVersion`, either by running an
 * external sync command (which owns the task file) or by reading the
 * matching GitHub milestone and writing `config.taskFile` ourselves.
 */
export async function syncTasks(config: RunConfig, sync: TaskSyncConfig, deps: TaskSyncDeps): Promise<void> {
  const { logger } = deps;

  if (sync.type === 'command') {
    const runner = deps.runner ?? runCommand;
    const command = [...sync.command, config.releaseVersion];
    const { code } = await runner(command, { stdio: 'inherit' });
    if (code !== 0) {
      throw new PrepareError(`Task sync command "${command.join(' ')}" exited with code ${code}`);
    }
    return;
  }

  const source = deps.issueSource
    ? deps.issueSource(sync)
    : new GitHubClient(sync.owner, sync.repo);
  const keys = await source.listMilestoneIssueKeys(config.releaseVersion);
  if (keys === null) {
    throw new PrepareError(`Milestone ${config.releaseVersion} not found in ${sync.owner}/${sync.repo}`);
  }
  logger.info(`Found milestone: ${config.releaseVersion}`);

  if (keys.length === 0) {
    logger.warn(`Milestone ${config.releaseVersion} has no issues; ${config.taskFile} will be empty`);
  }
  for (const key of keys) {
    logger.info(key);
  }
  await writeTaskFile(config.taskFile, keys);
}
