/**
 * LocalGitClient Tests
 *
 * A mock exec function is injected through the constructor, so no git
 * process is spawned.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CommandTimeoutError } from '../../errors/index.js';
import { GitCommandError, LocalGitClient, type GitExecFn } from '../local-git.js';

let mockExec: ReturnType<typeof vi.fn<GitExecFn>>;

beforeEach(() => {
  mockExec = vi.fn<GitExecFn>();
});

function createClient(timeoutMs?: number) {
  return new LocalGitClient('/repos/ledger', { execFile: mockExec, timeoutMs });
}

function mockStdout(stdout: string) {
  mockExec.mockResolvedValue({ stdout, stderr: '' });
}

describe('LocalGitClient', () => {
  it('runs git inside the repository with a time limit', async () => {
    mockStdout('diff --git a/x b/x\n');

    const diff = await createClient().diff('main', 'feature/refunds');

    expect(diff).toBe('diff --git a/x b/x\n');
    expect(mockExec).toHaveBeenCalledWith(
      'git',
      ['-C', '/repos/ledger', 'diff', 'main..feature/refunds'],
      { timeout: 30_000, maxBuffer: 64 * 1024 * 1024, killSignal: 'SIGKILL' }
    );
  });

  it('passes format and count to log', async () => {
    mockStdout('');

    await createClient().log('main', 'dev', { format: '%s', maxCount: 5 });

    expect(mockExec.mock.calls[0]?.[1]).toEqual([
      '-C',
      '/repos/ledger',
      'log',
      '--format=%s',
      '--max-count=5',
      'main..dev',
    ]);
  });

  it('summarises a branch from its commit subjects', async () => {
    mockStdout('Add refund endpoint\n\n  Wire nightly job  \n');

    expect(await createClient().branchSummary('main', 'dev')).toEqual({
      title: 'Add refund endpoint',
      body: 'Add refund endpoint\nWire nightly job',
      commitCount: 2,
    });
    expect(mockExec.mock.calls[0]?.[1]).toEqual([
      '-C',
      '/repos/ledger',
      'log',
      '--format=%s',
      '--max-count=50',
      'main..dev',
    ]);
  });

  it('limits the branch summary to the newest commits', async () => {
    mockStdout('Newest\n');

    await createClient().branchSummary('main', 'dev', 3);

    expect(mockExec.mock.calls[0]?.[1]).toContain('--max-count=3');
  });

  it('reports an empty branch', async () => {
    mockStdout('');

    expect(await createClient().branchSummary('main', 'dev')).toEqual({
      title: '(no commits)',
      body: '',
      commitCount: 0,
    });
  });

  it('lists tracked files', async () => {
    mockStdout('README.md\nsrc/app.ts\n');

    expect(await createClient().lsTree()).toEqual(['README.md', 'src/app.ts']);
    expect(mockExec.mock.calls[0]?.[1]).toEqual(['-C', '/repos/ledger', 'ls-tree', '-r', '--name-only', 'HEAD']);
  });

  it('detects the default branch', async () => {
    mockExec.mockResolvedValueOnce({ stdout: '* master\n', stderr: '' });

    expect(await createClient().defaultBranch()).toBe('master');
  });

  it('falls back to the first branch when neither main nor master exists', async () => {
    mockExec
      .mockResolvedValueOnce({ stdout: '', stderr: '' })
      .mockResolvedValueOnce({ stdout: 'trunk\nrelease\n', stderr: '' });

    expect(await createClient().defaultBranch()).toBe('trunk');
  });

  it('raises CommandTimeoutError when the process was killed', async () => {
    mockExec.mockRejectedValue(
      Object.assign(new Error('Command failed'), { killed: true, signal: 'SIGKILL', stderr: '' })
    );

    const error = await createClient(5000).diff('main', 'dev').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandTimeoutError);
    expect(error).toMatchObject({
      message: 'Command timed out after 5000ms: git -C /repos/ledger diff main..dev',
      timeoutMs: 5000,
      code: 9,
    });
  });

  it('reports an oversized output as a failed command, not a timeout', async () => {
    mockExec.mockRejectedValue(
      Object.assign(new RangeError('stdout maxBuffer length exceeded'), {
        code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
        killed: true,
        stderr: '',
      })
    );

    const error = await createClient().diff('main', 'dev').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitCommandError);
    expect(error).not.toBeInstanceOf(CommandTimeoutError);
    expect(error).toMatchObject({
      message: 'git command failed: git -C /repos/ledger diff main..dev\noutput exceeded 64MB; narrow the ref range',
    });
  });

  it('raises GitCommandError with stderr on a non-zero exit', async () => {
    mockExec.mockRejectedValue(
      Object.assign(new Error('Command failed'), {
        killed: false,
        code: 128,
        stderr: "fatal: bad revision 'main..nope'\n",
      })
    );

    await expect(createClient().diff('main', 'nope')).rejects.toThrow(
      "git command failed: git -C /repos/ledger diff main..nope\nfatal: bad revision 'main..nope'"
    );
  });

  it('explains a missing git executable', async () => {
    mockExec.mockRejectedValue(Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' }));

    const error = await createClient().currentBranch().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitCommandError);
    expect(error).toMatchObject({
      message: 'git command failed: git -C /repos/ledger rev-parse --abbrev-ref HEAD\ngit executable not found on PATH',
    });
  });
});
