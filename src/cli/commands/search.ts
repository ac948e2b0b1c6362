/**
 * Search Command
 *
 * Semantic search over indexed document chunks.
 *
 *   warden search "refund settlement"
 *   warden search "rate limits" --project ledger --type technical_design --top 3 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { SearchArgsSchema, SearchOptionsSchema, parseInput } from '../validation.js';
import type { RetrievalResult } from '../../search/retriever.js';

interface SearchCommandOptions {
  project?: string;
  type?: string;
  top: string;
}

const DEFAULT_TOP_K = 5;
const EXCERPT_CHARS = 200;

/**
 * One result as a header line plus an indented excerpt.
 */
export function formatSearchResult(result: RetrievalResult, rank: number): string {
  const { metadata } = result;
  const title = typeof metadata.title === 'string' ? metadata.title : String(metadata.doc_id ?? 'untitled');
  const where = [metadata.project_id, metadata.doc_type].filter((part) => part !== undefined).join('/');
  const excerpt = result.content.replace(/\s+/g, ' ').trim().slice(0, EXCERPT_CHARS);

  return (
    `${rank}. ${chalk.yellow(`[${result.similarity.toFixed(2)}]`)} ${chalk.bold(title)}` +
    (where ? ` ${chalk.dim(`(${where})`)}` : '') +
    `\n   ${excerpt}`
  );
}

export function createSearchCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search indexed documents by meaning')
    .option('-p, --project <id>', 'Limit search to one project')
    .option('-t, --type <type>', 'Limit search to one document type')
    .option('-k, --top <number>', 'Number of results to return', String(DEFAULT_TOP_K))
    .action(async (rawQuery: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      const { query } = parseInput(SearchArgsSchema, { query: rawQuery }, 'search query');
      const options = parseInput(SearchOptionsSchema, cmdOptions, 'search options');

      ctx.debug(`Query: "${query}"`);

      await withAppContext(ctx, openApp, async (app) => {
        const results = await app.retriever.retrieveSimilar(
          query,
          { projectId: options.project, docType: options.type },
          options.top
        );

        if (ctx.options.json) {
          console.log(JSON.stringify({ query, count: results.length, results }, null, 2));
          return;
        }

        if (results.length === 0) {
          ctx.log(chalk.yellow(`No results found for "${query}"`));
          ctx.log(chalk.dim('Index documents first: warden index <file> --project <id>'));
          return;
        }

        ctx.log(chalk.dim(`${results.length} result(s) for "${query}"`));
        ctx.log('');
        results.forEach((result, i) => {
          ctx.log(formatSearchResult(result, i + 1));
          ctx.log('');
        });
      });
    });
}
