/**
 * Local Git Client
 *
 * Thin async wrapper over the git CLI for one on-disk repository. Every
 * invocation is time-boxed: when the limit passes the process is killed
 * and a CommandTimeoutError is raised; partial output is discarded.
 *
 * @example
 * ```typescript
 * const git = new LocalGitClient('./payments-service');
 * const diff = await git.diff('main', 'feature/refunds');
 * const files = await git.lsTree();
 * ```
 */

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { CLIError, CommandTimeoutError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_GIT_TIMEOUT_MS = 30_000;

/** Diffs of large branches easily exceed Node's 1MB default */
export const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

export const DEFAULT_LOG_FORMAT = '%H%n%s%n%b%n---';
export const DEFAULT_LOG_MAX_COUNT = 50;

export interface GitExecOptions {
  timeout: number;
  maxBuffer: number;
  killSignal: NodeJS.Signals;
}

/**
 * Runs a command and resolves with its output. Extracted as a type so
 * tests can inject a stub instead of spawning git.
 */
export type GitExecFn = (
  cmd: string,
  args: string[],
  opts: GitExecOptions
) => Promise<{ stdout: string; stderr: string }>;

function defaultExecFile(
  cmd: string,
  args: string[],
  opts: GitExecOptions
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(cmd, args, opts, (error, stdout, stderr) => {
      if (error) {
        Object.assign(error, { stderr });
        reject(error);
      } else {
        resolve({ stdout, stderr });
      }
    });
  });
}

/**
 * git exited non-zero, or could not be started.
 */
export class GitCommandError extends CLIError {
  public readonly command: string;

  constructor(command: string, detail: string) {
    super(
      `git command failed: ${command}\n${detail}`,
      'Check that the directory is a git repository and that both refs exist',
      1
    );
    this.name = 'GitCommandError';
    this.command = command;
  }
}

export interface BranchSummary {
  /** First commit subject, or "(no commits)" */
  title: string;
  /** Every commit subject, one per line */
  body: string;
  commitCount: number;
}

export interface LocalGitClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  /** @internal Inject a custom exec function for testing */
  execFile?: GitExecFn;
}

export class LocalGitClient {
  readonly repoDir: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly execFileFn: GitExecFn;

  constructor(repoDir: string, options: LocalGitClientOptions = {}) {
    this.repoDir = path.resolve(repoDir);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.execFileFn = options.execFile ?? defaultExecFile;
  }

  /** Unified diff between two refs (`git diff base..head`) */
  async diff(base: string, head: string): Promise<string> {
    return this.run('diff', `${base}..${head}`);
  }

  async log(
    base: string,
    head: string,
    options: { format?: string; maxCount?: number } = {}
  ): Promise<string> {
    return this.run(
      'log',
      `--format=${options.format ?? DEFAULT_LOG_FORMAT}`,
      `--max-count=${options.maxCount ?? DEFAULT_LOG_MAX_COUNT}`,
      `${base}..${head}`
    );
  }

  /**
   * PR-like metadata for a branch comparison, built from the subjects of
   * the newest `maxCount` commits.
   */
  async branchSummary(
    base: string,
    head: string,
    maxCount: number = DEFAULT_LOG_MAX_COUNT
  ): Promise<BranchSummary> {
    const raw = await this.run('log', '--format=%s', `--max-count=${maxCount}`, `${base}..${head}`);
    const subjects = raw
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    return {
      title: subjects[0] ?? '(no commits)',
      body: subjects.join('\n'),
      commitCount: subjects.length,
    };
  }

  /** Tracked file paths at `ref` */
  async lsTree(ref: string = 'HEAD'): Promise<string[]> {
    const raw = await this.run('ls-tree', '-r', '--name-only', ref);
    return raw.split('\n').filter((line) => line.trim().length > 0);
  }

  async fileContent(filePath: string, ref: string = 'HEAD'): Promise<string> {
    return this.run('show', `${ref}:${filePath}`);
  }

  async currentBranch(): Promise<string> {
    return (await this.run('rev-parse', '--abbrev-ref', 'HEAD')).trim();
  }

  /**
   * `main` or `master` when either exists, else the first local branch,
   * else "main".
   */
  async defaultBranch(): Promise<string> {
    const listed = (await this.run('branch', '--list', 'main', 'master'))
      .split('\n')
      .map((line) => line.replace(/^\*/, '').trim());
    for (const candidate of ['main', 'master']) {
      if (listed.includes(candidate)) {
        return candidate;
      }
    }

    const all = (await this.run('branch', '--format=%(refname:short)'))
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return all[0] ?? 'main';
  }

  private async run(...args: string[]): Promise<string> {
    const fullArgs = ['-C', this.repoDir, ...args];
    const command = `git ${fullArgs.join(' ')}`;
    this.logger.debug?.(`Running: ${command}`);

    try {
      const { stdout } = await this.execFileFn('git', fullArgs, {
        timeout: this.timeoutMs,
        maxBuffer: MAX_BUFFER_BYTES,
        killSignal: 'SIGKILL',
      });
      return stdout;
    } catch (error) {
      throw this.translateError(error, command);
    }
  }

  private translateError(error: unknown, command: string): CLIError {
    if (!(error instanceof Error)) {
      return new GitCommandError(command, String(error));
    }
    // Node also kills the child (killed=true) when output overflows maxBuffer
    if ('code' in error && error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
      return new GitCommandError(
        command,
        `output exceeded ${MAX_BUFFER_BYTES / (1024 * 1024)}MB; narrow the ref range`
      );
    }
    if ('killed' in error && error.killed === true) {
      return new CommandTimeoutError(command, this.timeoutMs);
    }
    if ('code' in error && error.code === 'ENOENT') {
      return new GitCommandError(command, 'git executable not found on PATH');
    }
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return new GitCommandError(command, stderr || error.message);
  }
}
