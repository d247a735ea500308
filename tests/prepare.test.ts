import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { IssueSource } from '../src/github.js';
import { prepare } from '../src/prepare.js';
import { PrepareError, syncTasks } from '../src/tasks.js';
import { baseConfig, fakeRunner, recordingLogger } from './helpers.js';

function staticIssues(keys: string[] | null): IssueSource & { milestones: string[] } {
  const milestones: string[] = [];
  return {
    milestones,
    listMilestoneIssueKeys: async (milestone) => {
      milestones.push(milestone);
      return keys;
    },
  };
}

describe('syncTasks', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'release-tasks-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('passes the release version as the sync command argument', async () => {
    const runner = fakeRunner();
    await syncTasks(baseConfig(), { type: 'command', command: ['python3', 'tracker-sync.py'] }, {
      runner,
      logger: recordingLogger(),
    });

    expect(runner.calls).toEqual([
      { command: ['python3', 'tracker-sync.py', '2.2.1'], options: { stdio: 'inherit' } },
    ]);
  });

  test('fails when the sync command exits non-zero', async () => {
    const runner = fakeRunner(() => 2);
    await expect(
      syncTasks(baseConfig(), { type: 'command', command: ['sync'] }, { runner, logger: recordingLogger() }),
    ).rejects.toThrow(new PrepareError('Task sync command "sync 2.2.1" exited with code 2'));
  });

  test('writes milestone issue keys to the task file', async () => {
    const taskFile = join(tempDir, 'tasks.txt');
    const source = staticIssues(['#3', '#11']);
    const logger = recordingLogger();

    await syncTasks(baseConfig({ taskFile }), { type: 'github', owner: 'acme', repo: 'platform' }, {
      issueSource: () => source,
      logger,
    });

    expect(source.milestones).toEqual(['2.2.1']);
    expect(readFileSync(taskFile, 'utf-8')).toBe('#3\n#11\n');
    expect(logger.lines.map((line) => line.message)).toEqual(['Found milestone: 2.2.1', '#3', '#11']);
  });

  test('writes an empty task file for an empty milestone', async () => {
    const taskFile = join(tempDir, 'tasks.txt');
    const logger = recordingLogger();

    await syncTasks(baseConfig({ taskFile }), { type: 'github', owner: 'acme', repo: 'platform' }, {
      issueSource: () => staticIssues([]),
      logger,
    });

    expect(readFileSync(taskFile, 'utf-8')).toBe('');
    expect(logger.lines).toEqual([
      { level: 'info', message: 'Found milestone: 2.2.1' },
      { level: 'warn', message: `Milestone 2.2.1 has no issues; ${taskFile} will be empty` },
    ]);
  });

  test('fails when the milestone does not exist', async () => {
    await expect(
      syncTasks(baseConfig(), { type: 'github', owner: 'acme', repo: 'platform' }, {
        issueSource: () => staticIssues(null),
        logger: recordingLogger(),
      }),
    ).rejects.toThrow('Milestone 2.2.1 not found in acme/platform');
  });
});

describe('prepare', () => {
  test('installs before syncing tasks', async () => {
    const runner = fakeRunner();
    const config = baseConfig({
      install: ['pip', 'install', '-r', 'requirements.txt'],
      taskSync: { type: 'command', command: ['python3', 'tracker-sync.py'] },
    });

    await prepare(config, { runner, logger: recordingLogger() });

    expect(runner.calls.map((call) => call.command)).toEqual([
      ['pip', 'install', '-r', 'requirements.txt'],
      ['python3', 'tracker-sync.py', '2.2.1'],
    ]);
  });

  test('stops when the install fails', async () => {
    const runner = fakeRunner((command) => (command[0] === 'pip' ? 1 : 0));
    const config = baseConfig({
      install: ['pip', 'install'],
      taskSync: { type: 'command', command: ['sync'] },
    });

    await expect(prepare(config, { runner, logger: recordingLogger() })).rejects.toThrow(
      'Install command "pip install" exited with code 1',
    );
    expect(runner.calls).toHaveLength(1);
  });

  test('does nothing without install or task sync', async () => {
    const runner = fakeRunner();
    await prepare(baseConfig(), { runner, logger: recordingLogger() });
    expect(runner.calls).toEqual([]);
  });
});
