/**
 * Index Command
 *
 * Indexes one document into a project: chunks, embeds and stores it, then
 * links the document and its entities in the knowledge graph.
 *
 * Usage:
 *   warden index docs/design.md --project ledger --type technical_design
 *   warden index prd.md -p ledger --title "Refunds PRD" --type prd
 *   warden index notes.txt -p ledger --json    Output progress as NDJSON
 */

import { Command } from 'commander';
import { basename, resolve } from 'node:path';
import { existsSync, readFileSync, statSync } from 'node:fs';
import chalk from 'chalk';

import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { IndexOptionsSchema, parseInput } from '../validation.js';
import { createProgressReporter } from '../utils/progress.js';
import { documentIdFor } from '../utils/files.js';
import { CLIError } from '../../errors/index.js';

/**
 * Raw options as commander parses them.
 */
interface IndexCommandOptions {
  project?: string;
  projectName?: string;
  docId?: string;
  title?: string;
  type?: string;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @param openApp - Opens the core; tests pass an in-memory one
 */
export function createIndexCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('index')
    .argument('<file>', 'Document to index (markdown or plain text)')
    .description('Index a document into a project')
    .requiredOption('-p, --project <id>', 'Project the document belongs to')
    .option('--project-name <name>', 'Project display name (creates or renames the project)')
    .option('--doc-id <id>', 'Document id (defaults to <project>/<file name>)')
    .option('--title <title>', 'Document title (defaults to the file name)')
    .option('-t, --type <type>', 'Document type, e.g. prd or technical_design', 'document')
    .action(async (file: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(IndexOptionsSchema, cmdOptions, 'index options');

      const filePath = resolve(file);
      if (!existsSync(filePath)) {
        throw new CLIError(`File does not exist: ${filePath}`, 'Check the path and try again');
      }
      if (!statSync(filePath).isFile()) {
        throw new CLIError(
          `Path is not a file: ${filePath}`,
          'warden index takes one document; run it once per file'
        );
      }

      const content = readFileSync(filePath, 'utf-8');
      const docId = options.docId ?? documentIdFor(options.project, filePath);
      const title = options.title ?? basename(filePath);

      ctx.debug(`Indexing ${filePath} as ${docId} (${options.type})`);

      await withAppContext(ctx, openApp, async (app) => {
        ctx.debug(`Model profile: ${app.profile.name}`);

        const existing = await app.graph.getProjectGraph(options.project);
        if (existing.project === null || options.projectName !== undefined) {
          await app.graph.addProject(options.project, options.projectName ?? options.project);
          if (existing.project === null) {
            ctx.debug(`Created project ${options.project}`);
          }
        }

        const reporter = createProgressReporter({ json: ctx.options.json });
        try {
          const result = await app.pipeline.indexDocument(
            { docId, projectId: options.project, title, docType: options.type, content },
            { onStage: (stage) => reporter.startStage(stage) }
          );
          reporter.showSummary(result);
          if (result.chunks === 0) {
            ctx.warn(`${basename(filePath)} is empty; nothing was stored`);
          }
        } catch (error) {
          reporter.fail(chalk.red('Indexing failed'));
          throw error;
        }
      });
    });
}
