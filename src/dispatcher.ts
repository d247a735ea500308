import { stat } from 'fs/promises';
import { messagesFor } from './messages.js';
import { runCommand } from './process.js';
import type { CommandRunner } from './process.js';
import type { DispatchSummary, Logger, RepoResult, RunConfig } from './types.js';

export type DirectoryProbe = (path: string) => Promise<boolean>;

export const isDirectory: DirectoryProbe = (path) =>
  stat(path)
    .then((stats) => stats.isDirectory())
    .catch(() => false);

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, error) => {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};

export interface DispatcherDeps {
  runner?: CommandRunner;
  probe?: DirectoryProbe;
  logger?: Logger;
}

export function delegateArgs(config: RunConfig, repoPath: string): string[] {
  return [
    config.sourceBranch,
    config.targetBranch,
    config.taskFile,
    `--release=${config.releaseVersion}`,
    `--repo-dir=${repoPath}`,
  ];
}

/**
 * Runs the cherry-pick delegate once per existing repository directory,
 * one at a time and in configuration order.
 */
export class BatchReleaseDispatcher {
  private runner: CommandRunner;
  private probe: DirectoryProbe;
  private logger: Logger;

  constructor(deps: DispatcherDeps = {}) {
    this.runner = deps.runner ?? runCommand;
    this.probe = deps.probe ?? isDirectory;
    this.logger = deps.logger ?? consoleLogger;
  }

  async run(config: RunConfig): Promise<RepoResult[]> {
    const messages = messagesFor(config.locale);
    const results: RepoResult[] = [];
    let halted = false;

    for (const path of config.repoPaths) {
      if (halted) {
        results.push({ path, attempted: false, outcome: 'aborted' });
        continue;
      }

      if (!(await this.probe(path))) {
        this.logger.info(messages.missing(path));
        results.push({ path, attempted: false, outcome: 'missing' });
        continue;
      }

      this.logger.info(messages.processing(path));
      const result = await this.invokeDelegate(config, path);
      this.logger.info(messages.separator);
      results.push(result);

      if (result.outcome === 'failed' && config.failurePolicy === 'fail-fast') {
        halted = true;
      }
    }

    return results;
  }

  private async invokeDelegate(config: RunConfig, path: string): Promise<RepoResult> {
    const command = [...config.delegate, ...delegateArgs(config, path)];
    try {
      const { code } = await this.runner(command, { stdio: 'inherit' });
      return {
        path,
        attempted: true,
        outcome: code === 0 ? 'succeeded' : 'failed',
        exitCode: code,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to start ${config.delegate.join(' ')} for ${path}: ${message}`);
      return { path, attempted: true, outcome: 'failed', error: message };
    }
  }
}

export function summarize(results: readonly RepoResult[]): DispatchSummary {
  const summary: DispatchSummary = { total: results.length, succeeded: 0, failed: 0, missing: 0, aborted: 0 };
  for (const result of results) {
    summary[result.outcome] += 1;
  }
  return summary;
}

export function hasFailures(summary: DispatchSummary): boolean {
  return summary.failed > 0;
}
