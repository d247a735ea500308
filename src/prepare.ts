import { runCommand } from './process.js';
import { PrepareError, syncTasks } from './tasks.js';
import type { TaskSyncDeps } from './tasks.js';
import type { RunConfig } from './types.js';

export async function installDependencies(config: RunConfig, deps: TaskSyncDeps): Promise<void> {
  if (!config.install) {
    return;
  }
  const runner = deps.runner ?? runCommand;
  const { code } = await runner(config.install, { stdio: 'inherit' });
  if (code !== 0) {
    throw new PrepareError(`Install command "${config.install.join(' ')}" exited with code ${code}`);
  }
}

// Install first: the sync command may depend on what it installs.
export async function prepare(config: RunConfig, deps: TaskSyncDeps): Promise<void> {
  await installDependencies(config, deps);
  if (config.taskSync) {
    await syncTasks(config, config.taskSync, deps);
  }
}
