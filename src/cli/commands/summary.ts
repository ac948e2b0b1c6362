/**
 * Summary Command
 *
 * Builds a repository map (file tree plus source signatures) from a local
 * git checkout and stores it for scope checks.
 *
 *   warden summary ./ledger-service --key acme/ledger
 *   warden summary . --ref release/1.2
 */

import { Command } from 'commander';
import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { SummaryOptionsSchema, parseInput } from '../validation.js';
import { buildRepoMap } from '../../indexer/pipeline.js';

interface SummaryCommandOptions {
  key?: string;
  ref?: string;
}

export function createSummaryCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('summary')
    .argument('[repo]', 'Path to the git repository', '.')
    .description('Store a repository map used as context by scope checks')
    .option('-k, --key <key>', 'Key to store the map under (defaults to the directory name)')
    .option('--ref <ref>', 'Git ref to list files from', 'HEAD')
    .action(async (repo: string, cmdOptions: SummaryCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(SummaryOptionsSchema, cmdOptions, 'summary options');
      const repoDir = resolve(repo);
      const repoKey = options.key ?? basename(repoDir);

      await withAppContext(ctx, openApp, async (app) => {
        const files = await app.createGitClient(repoDir).lsTree(options.ref);
        const map = buildRepoMap(files);
        await app.pipeline.indexRepoSummary({ repoKey, ...map });

        const listed = map.fileTree ? map.fileTree.split('\n').length : 0;
        if (ctx.options.json) {
          console.log(JSON.stringify({ repoKey, filesTracked: files.length, filesListed: listed }));
        } else {
          ctx.log(
            `${chalk.green('✓')} Stored repository map ${chalk.cyan(repoKey)} ` +
              chalk.dim(`(${listed} of ${files.length} files)`)
          );
        }
      });
    });
}
