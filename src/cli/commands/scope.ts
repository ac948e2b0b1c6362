/**
 * Scope Command
 *
 * Checks a change against the project's approved design and prints the
 * review comment.
 *
 * Two ways to name the change:
 *   warden scope --project ledger --diff-file change.patch --title "Add refunds"
 *   warden scope --project ledger --repo ../ledger --base main --head feature/refunds
 *
 * In git mode the base defaults to the repository's default branch, the
 * head to the checked-out branch, and title/description to the commit
 * subjects. The repository's CI workflows are appended to the description.
 */

import { Command } from 'commander';
import { basename, resolve } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { ScopeOptionsSchema, parseInput } from '../validation.js';
import { CLIError, MalformedOutputError, ValidationError } from '../../errors/index.js';
import type { AppContext } from '../../context.js';
import { formatScopeComment, type ScopeCheckInput } from '../../agents/index.js';
import { parseWorkflows, summariseWorkflowsForPrompt } from '../../integrations/index.js';

interface ScopeCommandOptions {
  project?: string;
  repo?: string;
  key?: string;
  base?: string;
  head?: string;
  diffFile?: string;
  title?: string;
  description?: string;
}

type ScopeOptions = z.output<typeof ScopeOptionsSchema>;

function fromDiffFile(options: ScopeOptions, diffFile: string, repoKey: string): ScopeCheckInput {
  const diffPath = resolve(diffFile);
  if (!existsSync(diffPath)) {
    throw new CLIError(`Diff file does not exist: ${diffPath}`, 'Create one with: git diff main > change.patch');
  }
  return {
    projectId: options.project,
    repoKey,
    changeLabel: `patch ${basename(diffPath)}`,
    title: options.title ?? basename(diffPath),
    description: options.description ?? '',
    diff: readFileSync(diffPath, 'utf-8'),
  };
}

async function fromGit(
  app: AppContext,
  ctx: CommandContext,
  options: ScopeOptions,
  repoDir: string,
  repoKey: string
): Promise<ScopeCheckInput> {
  const git = app.createGitClient(repoDir);
  const base = options.base ?? (await git.defaultBranch());
  const head = options.head ?? (await git.currentBranch());
  if (head === base) {
    throw new ValidationError(`Nothing to compare: head and base are both ${base}`, [
      'Check out a feature branch or pass --head <branch>',
    ]);
  }
  ctx.debug(`Comparing ${head} against ${base} in ${repoDir}`);

  const [diff, summary, workflows] = await Promise.all([
    git.diff(base, head),
    git.branchSummary(base, head),
    parseWorkflows(repoDir, { logger: ctx }),
  ]);
  if (diff.trim() === '') {
    ctx.warn(`${head} has no changes against ${base}`);
  }

  const ci = summariseWorkflowsForPrompt(workflows);
  const description = options.description ?? summary.body;
  return {
    projectId: options.project,
    repoKey,
    changeLabel: `branch ${head} → ${base}`,
    title: options.title ?? summary.title,
    description: ci ? `${description}\n\n${ci}` : description,
    diff,
  };
}

export function createScopeCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('scope')
    .description('Check a change against the approved design document')
    .requiredOption('-p, --project <id>', 'Project whose design document applies')
    .option('-r, --repo <path>', 'Git repository holding the change', '.')
    .option('-k, --key <key>', 'Repository map key (defaults to the repository directory name)')
    .option('--base <ref>', 'Base branch (defaults to main/master)')
    .option('--head <ref>', 'Head branch (defaults to the current branch)')
    .option('--diff-file <path>', 'Read the diff from a file instead of git')
    .option('--title <title>', 'Change title')
    .option('--description <text>', 'Change description')
    .action(async (cmdOptions: ScopeCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(ScopeOptionsSchema, cmdOptions, 'scope options');
      const repoDir = resolve(options.repo);
      const repoKey = options.key ?? basename(repoDir);

      await withAppContext(ctx, openApp, async (app) => {
        const input =
          options.diffFile !== undefined
            ? fromDiffFile(options, options.diffFile, repoKey)
            : await fromGit(app, ctx, options, repoDir, repoKey);

        const result = await app.createScopeChecker().check(input);
        if (!result.ok) {
          throw new MalformedOutputError(result.error, result.raw);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(result.report, null, 2));
          return;
        }

        ctx.log(formatScopeComment(result.report).trimEnd());
      });
    });
}
