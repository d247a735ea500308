import type { CommandResult, CommandRunner, RunCommandOptions } from '../src/process.js';
import type { Logger, RunConfig } from '../src/types.js';

export interface LogLine {
  level: 'info' | 'warn' | 'error';
  message: string;
}

export function recordingLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
  };
}

export interface RecordedCall {
  command: string[];
  options?: RunCommandOptions;
}

/** Records every command; exit codes come from `codeFor`, defaulting to 0. */
export function fakeRunner(codeFor: (command: string[]) => number = () => 0): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner = async (command: readonly string[], options?: RunCommandOptions): Promise<CommandResult> => {
    const copy = [...command];
    calls.push({ command: copy, options });
    return { code: codeFor(copy), stdout: '', stderr: '' };
  };
  return Object.assign(runner, { calls });
}

export function baseConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    releaseVersion: '2.2.1',
    sourceBranch: 'test',
    targetBranch: 'pre-prod',
    taskFile: 'tasks.txt',
    repoPaths: [],
    delegate: ['python3', 'git_cherry_picker.py'],
    locale: 'en',
    failurePolicy: 'continue',
    ...overrides,
  };
}
