import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DEFAULT_CONFIG_PATH } from './config.js';
import type { CliOptions } from './types.js';

export function parseCliArgs(argv: string[] = hideBin(process.argv)): CliOptions {
  const parsed = yargs(argv)
    .scriptName('release-dispatch')
    .usage('Usage: $0 [run|sync-tasks] [options]')
    .command(['run', '$0'], 'Cherry-pick the release into every configured repository')
    .command('sync-tasks', 'Write the task file for the release from the issue tracker')
    .option('config', {
      alias: 'c',
      describe: 'Path to the JSON run configuration',
      type: 'string',
    })
    .option('release', { describe: 'Release version', type: 'string' })
    .option('source', { describe: 'Branch to pick commits from', type: 'string' })
    .option('target', { describe: 'Branch to apply commits to', type: 'string' })
    .option('task-file', { describe: 'Task list passed to the delegate', type: 'string' })
    .option('repo', {
      describe: 'Repository directory (repeatable, replaces the configured list)',
      type: 'string',
      array: true,
    })
    .option('locale', { describe: 'Console message language', choices: ['en', 'ru'] as const })
    .option('fail-fast', { describe: 'Stop at the first failed delegate', type: 'boolean' })
    .option('strict', {
      describe: 'Exit non-zero when any delegate fails',
      type: 'boolean',
      default: false,
    })
    .option('skip-prepare', {
      describe: 'Skip the install and task sync steps',
      type: 'boolean',
      default: false,
    })
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  const command = parsed._[0] === undefined ? 'run' : String(parsed._[0]);
  if (command !== 'run' && command !== 'sync-tasks') {
    throw new Error('Command must be one of: run, sync-tasks');
  }

  return {
    command,
    configPath: parsed.config ?? DEFAULT_CONFIG_PATH,
    configExplicit: parsed.config !== undefined,
    overrides: {
      releaseVersion: parsed.release,
      sourceBranch: parsed.source,
      targetBranch: parsed.target,
      taskFile: parsed.taskFile,
      repoPaths: parsed.repo?.map(String),
      locale: parsed.locale,
      failurePolicy: parsed.failFast === undefined ? undefined : parsed.failFast ? 'fail-fast' : 'continue',
    },
    strict: parsed.strict,
    skipPrepare: parsed.skipPrepare,
  };
}
