/**
 * Launch Command
 *
 * Drafts a launch checklist for human review.
 *
 *   warden launch -p ledger --doc design.md prd.md
 *   warden launch -p ledger --doc design.md --risks risk-report.json --metrics ci.json
 *
 * --risks takes a saved `warden risk --json` report or a bare array of
 * risks; --metrics takes a JSON object of metric name to value.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import {
  LaunchMetricsFileSchema,
  LaunchOptionsSchema,
  RisksFileSchema,
  parseInput,
} from '../validation.js';
import { readJsonFile, readProjectDocuments } from '../utils/files.js';
import { MalformedOutputError } from '../../errors/index.js';
import type { LaunchChecklist } from '../../agents/index.js';

interface LaunchCommandOptions {
  project?: string;
  doc?: string[];
  risks?: string;
  metrics?: string;
}

export function formatLaunchChecklist(checklist: LaunchChecklist): string[] {
  const lines: string[] = [];

  if (checklist.fields.length === 0) {
    lines.push('No checklist fields could be filled.');
  } else {
    lines.push(chalk.bold(`Launch checklist (${checklist.fields.length} fields)`));
    for (const field of checklist.fields) {
      const confidence = chalk.dim(`[${Math.round(field.confidence * 100)}%]`);
      const review = field.needs_human_review ? ` ${chalk.yellow('needs review')}` : '';
      lines.push(`  ${field.field_name}: ${field.value || '(empty)'} ${confidence}${review}`);
      if (field.evidence) lines.push(chalk.dim(`    Evidence: ${field.evidence}`));
    }
  }

  if (checklist.warnings.length > 0) {
    lines.push('', chalk.bold(`Warnings (${checklist.warnings.length})`));
    for (const warning of checklist.warnings) {
      lines.push(`  ${chalk.yellow('!')} ${warning}`);
    }
  }

  if (checklist.missing_information.length > 0) {
    lines.push('', chalk.bold(`Missing information (${checklist.missing_information.length})`));
    for (const item of checklist.missing_information) {
      lines.push(`  - ${item}`);
    }
  }
  return lines;
}

export function createLaunchCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('launch')
    .description('Draft a launch checklist from project documents, risks and metrics')
    .requiredOption('-p, --project <id>', 'Project about to launch')
    .option('-d, --doc <files...>', 'Project documents (PRD, design, runbooks)')
    .option('-r, --risks <file>', 'Saved risk report (warden risk --json) or JSON array of risks')
    .option('-m, --metrics <file>', 'JSON object of CI/CD and production metrics')
    .action(async (cmdOptions: LaunchCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(LaunchOptionsSchema, cmdOptions, 'launch options');
      const risks =
        options.risks !== undefined ? readJsonFile(options.risks, RisksFileSchema, 'Risks file') : undefined;
      const metrics =
        options.metrics !== undefined
          ? readJsonFile(options.metrics, LaunchMetricsFileSchema, 'Metrics file')
          : undefined;

      await withAppContext(ctx, openApp, async (app) => {
        const graph = await app.graph.getProjectGraph(options.project);
        const documents = readProjectDocuments(options.doc, options.project, graph);
        if (documents.length === 0) {
          ctx.warn('No documents given; the checklist will rest on risks and metrics alone');
        }

        const result = await app.createLaunchPrefill().prefill({
          projectName: graph.project?.name ?? options.project,
          documents,
          risks,
          metrics,
        });
        if (!result.ok) {
          throw new MalformedOutputError(result.error, result.raw);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(result.report, null, 2));
          return;
        }
        for (const line of formatLaunchChecklist(result.report)) {
          ctx.log(line);
        }
      });
    });
}
