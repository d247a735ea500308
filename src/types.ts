export type Locale = 'en' | 'ru';

export type FailurePolicy = 'continue' | 'fail-fast';

export type TaskSyncConfig =
  | { type: 'command'; command: readonly string[] }
  | { type: 'github'; owner: string; repo: string };

export interface RunConfig {
  readonly releaseVersion: string;
  readonly sourceBranch: string;
  readonly targetBranch: string;
  readonly taskFile: string;
  readonly repoPaths: readonly string[];
  readonly delegate: readonly string[];
  readonly locale: Locale;
  readonly failurePolicy: FailurePolicy;
  readonly install?: readonly string[];
  readonly taskSync?: TaskSyncConfig;
}

export type RepoOutcome = 'missing' | 'succeeded' | 'failed' | 'aborted';

export interface RepoResult {
  path: string;
  attempted: boolean;
  outcome: RepoOutcome;
  exitCode?: number;
  error?: string;
}

export interface DispatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  missing: number;
  aborted: number;
}

export interface ConfigOverrides {
  releaseVersion?: string;
  sourceBranch?: string;
  targetBranch?: string;
  taskFile?: string;
  repoPaths?: string[];
  locale?: Locale;
  failurePolicy?: FailurePolicy;
}

export interface CliOptions {
  command: 'run' | 'sync-tasks';
  configPath: string;
  configExplicit: boolean;
  overrides: ConfigOverrides;
  strict: boolean;
  skipPrepare: boolean;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}
