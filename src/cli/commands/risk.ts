/**
 * Risk Command
 *
 * Predicts delivery risks for a PRD and records the dependencies it names
 * in the knowledge graph.
 *
 *   warden risk prd.md --project ledger
 *   warden risk prd.md -p ledger --events past-launches.json --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { HistoricalEventsFileSchema, RiskOptionsSchema, parseInput } from '../validation.js';
import { readInputFile, readJsonFile } from '../utils/files.js';
import { MalformedOutputError } from '../../errors/index.js';
import type { RiskReport } from '../../agents/index.js';

interface RiskCommandOptions {
  project?: string;
  events?: string;
}

const SEVERITY_COLORS: Record<string, (text: string) => string> = {
  critical: chalk.red,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.blue,
};

export function formatRiskReport(report: RiskReport): string[] {
  const lines = [chalk.bold(`Overall risk: ${Math.round(report.overall_risk_score * 100)}%`), ''];

  if (report.risks.length === 0) {
    lines.push('No risks identified.');
  } else {
    lines.push(chalk.bold(`Risks (${report.risks.length})`));
    for (const risk of report.risks) {
      const color = SEVERITY_COLORS[risk.severity] ?? chalk.white;
      lines.push(`  ${color(`[${risk.severity}]`)} ${risk.title}`);
      if (risk.description) lines.push(`    ${risk.description}`);
      if (risk.mitigation) lines.push(chalk.dim(`    Mitigation: ${risk.mitigation}`));
    }
  }

  if (report.dependencies.length > 0) {
    lines.push('', chalk.bold(`Dependencies (${report.dependencies.length})`));
    for (const dep of report.dependencies) {
      lines.push(`  → ${dep.target} ${chalk.dim(`[${dep.type}]`)}`);
    }
  }

  if (report.summary) {
    lines.push('', report.summary);
  }
  return lines;
}

export function createRiskCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  return new Command('risk')
    .argument('<prd>', 'PRD file to analyse')
    .description('Predict delivery risks and dependencies for a PRD')
    .requiredOption('-p, --project <id>', 'Project the PRD belongs to')
    .option('-e, --events <file>', 'JSON array of historical launch events')
    .action(async (prdFile: string, cmdOptions: RiskCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(RiskOptionsSchema, cmdOptions, 'risk options');
      const prdContent = readInputFile(prdFile, 'PRD file');
      const historicalEvents =
        options.events !== undefined
          ? readJsonFile(options.events, HistoricalEventsFileSchema, 'Events file')
          : [];

      await withAppContext(ctx, openApp, async (app) => {
        const result = await app
          .createRiskAnalyzer()
          .analyze({ projectId: options.project, prdContent, historicalEvents });
        if (!result.ok) {
          throw new MalformedOutputError(result.error, result.raw);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(result.report, null, 2));
          return;
        }
        for (const line of formatRiskReport(result.report)) {
          ctx.log(line);
        }
      });
    });
}
