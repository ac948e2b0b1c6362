/**
 * Progress Reporter
 *
 * Shows the ingest pipeline's stages while a document is indexed.
 * Output modes:
 * - Interactive: one ora spinner per stage
 * - JSON: NDJSON event stream for CI
 * - Text: one line per stage for non-TTY output
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IndexDocumentResult, IndexingStage } from '../../indexer/pipeline.js';

const STAGE_LABELS: Record<IndexingStage, string> = {
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
  enriching: 'Enriching',
};

export interface ProgressReporterOptions {
  json: boolean;
  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'stage_start' | 'stage_complete' | 'complete';

export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private stageStartedAt = 0;
  private readonly startedAt = performance.now();

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start `stage`, completing the previous one. Pass this as the
   * pipeline's onStage callback.
   */
  startStage(stage: IndexingStage): void {
    this.completeStage();
    this.currentStage = stage;
    this.stageStartedAt = performance.now();

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', timestamp: new Date().toISOString(), stage, data: {} });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  /** Stop the spinner after a failure */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  showSummary(result: IndexDocumentResult): void {
    this.completeStage();
    const totalMs = Math.round(performance.now() - this.startedAt);

    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result, durationMs: totalMs },
      });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Index Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Document:')}         ${result.docId}`);
    console.log(`  ${chalk.dim('Chunks stored:')}    ${result.chunks.toLocaleString()}`);
    console.log(`  ${chalk.dim('Entities linked:')}  ${result.entities.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(totalMs)}`);
    if (result.enrichmentFailed) {
      console.log('');
      console.log(chalk.yellow('  Graph enrichment failed; chunks are searchable but not linked'));
    }
    console.log('');
  }

  private completeStage(): void {
    const stage = this.currentStage;
    if (stage === null) return;
    const durationMs = Math.round(performance.now() - this.stageStartedAt);

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage,
        data: { durationMs },
      });
    } else if (this.spinner) {
      this.spinner.succeed(`${STAGE_LABELS[stage]} (${formatDuration(durationMs)})`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    noColor: options.noColor ?? !!process.env['NO_COLOR'],
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
