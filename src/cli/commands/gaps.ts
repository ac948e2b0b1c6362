/**
 * Gaps Command
 *
 * Post-launch review: compares measured metrics with the targets a
 * project promised and explains each miss.
 *
 *   warden gaps -p ledger --targets targets.json --doc prd.md --days 30
 *   warden gaps -p ledger --targets targets.json --json
 *
 * The targets file is a JSON array of
 * `{ "metric_name", "target_value", "actual_value"?, "unit"? }`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { GapsOptionsSchema, MetricTargetsFileSchema, parseInput } from '../validation.js';
import { readJsonFile, readProjectDocuments } from '../utils/files.js';
import { MalformedOutputError } from '../../errors/index.js';
import type { GapReport, MetricTarget } from '../../agents/index.js';

interface GapsCommandOptions {
  project?: string;
  targets?: string;
  doc?: string[];
  days: string;
}

const STATUS_COLORS: Record<string, (text: string) => string> = {
  on_track: chalk.green,
  at_risk: chalk.yellow,
  off_track: chalk.red,
};

export function formatGapReport(report: GapReport): string[] {
  const color = STATUS_COLORS[report.overall_status] ?? chalk.white;
  const lines = [`${chalk.bold('Status:')} ${color(report.overall_status)}`];
  if (report.next_review_date) {
    lines.push(`Next review: ${report.next_review_date}`);
  }
  lines.push('');

  if (report.gaps.length === 0) {
    lines.push('No gaps found.');
  } else {
    lines.push(chalk.bold(`Gaps (${report.gaps.length})`));
    for (const gap of report.gaps) {
      lines.push(
        `  [${gap.priority}] ${gap.metric_name}: ${gap.actual || '?'} against ${gap.target || '?'} ` +
          `(${gap.gap_percentage.toFixed(1)}% short, ${gap.effort_estimate} effort)`
      );
      if (gap.root_causes.length > 0) lines.push(`    Causes: ${gap.root_causes.join('; ')}`);
      if (gap.recommendations.length > 0) {
        lines.push(chalk.dim(`    Recommended: ${gap.recommendations.join('; ')}`));
      }
    }
  }

  if (report.metrics_on_track.length > 0) {
    lines.push('', `On track: ${report.metrics_on_track.join(', ')}`);
  }
  if (report.executive_summary) {
    lines.push('', report.executive_summary);
  }
  return lines;
}

export function createGapsCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('gaps')
    .description('Compare post-launch metrics with their targets and explain the gaps')
    .requiredOption('-p, --project <id>', 'Launched project')
    .requiredOption('--targets <file>', 'JSON array of metric targets with their actual values')
    .option('-d, --doc <files...>', 'Project documents to ground the analysis (PRD, design)')
    .option('--days <n>', 'Days since launch', '0')
    .action(async (cmdOptions: GapsCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(GapsOptionsSchema, cmdOptions, 'gaps options');
      const targets: MetricTarget[] = readJsonFile(
        options.targets,
        MetricTargetsFileSchema,
        'Targets file'
      ).map((target) => ({
        metricName: target.metric_name,
        targetValue: target.target_value,
        actualValue: target.actual_value ?? undefined,
        unit: target.unit,
      }));

      await withAppContext(ctx, openApp, async (app) => {
        const graph = await app.graph.getProjectGraph(options.project);
        const documents = readProjectDocuments(options.doc, options.project, graph);
        ctx.debug(`Gap analysis over ${targets.length} target(s) and ${documents.length} document(s)`);

        const result = await app.createGapAnalyzer().analyze({
          projectName: graph.project?.name ?? options.project,
          targets,
          documents,
          daysSinceLaunch: options.days,
        });
        if (!result.ok) {
          throw new MalformedOutputError(result.error, result.raw);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(result.report, null, 2));
          return;
        }
        for (const line of formatGapReport(result.report)) {
          ctx.log(line);
        }
      });
    });
}
