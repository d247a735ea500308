import { parseCliArgs } from './index.js';
import { loadRunConfig } from './config.js';
import { BatchReleaseDispatcher, consoleLogger, hasFailures, summarize } from './dispatcher.js';
import { prepare } from './prepare.js';
import { PrepareError, syncTasks } from './tasks.js';
import type { DispatcherDeps } from './dispatcher.js';
import type { TaskSyncDeps } from './tasks.js';

export type MainDeps = DispatcherDeps & Partial<TaskSyncDeps>;

/**
 * Runs the CLI and returns the process exit code.
 */
export async function main(argv?: string[], deps: MainDeps = {}): Promise<number> {
  const logger = deps.logger ?? consoleLogger;

  try {
    const options = parseCliArgs(argv);
    const config = await loadRunConfig(options.configPath, options.overrides, options.configExplicit);
    const prepareDeps: TaskSyncDeps = { runner: deps.runner, issueSource: deps.issueSource, logger };

    if (options.command === 'sync-tasks') {
      if (!config.taskSync) {
        throw new PrepareError('No taskSync is configured');
      }
      await syncTasks(config, config.taskSync, prepareDeps);
      return 0;
    }

    if (!options.skipPrepare) {
      await prepare(config, prepareDeps);
    }

    const dispatcher = new BatchReleaseDispatcher({ ...deps, logger });
    const results = await dispatcher.run(config);

    if (options.strict && hasFailures(summarize(results))) {
      for (const result of results) {
        if (result.outcome === 'failed') {
          const reason = result.error ?? `exit code ${result.exitCode}`;
          logger.error(`Cherry-pick failed for ${result.path} (${reason})`);
        }
      }
      return 1;
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${message}`);
    return 1;
  }
}

