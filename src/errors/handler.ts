/**
 * Turns a failure into what the shell sees: a message on stderr and an
 * exit code. Each error is first reduced to an ErrorReport, then rendered
 * as coloured text or, under --json, as one JSON object.
 */

import chalk from 'chalk';
import {
  CLIError,
  CommandTimeoutError,
  DatabaseError,
  MalformedOutputError,
  TransientIOError,
} from './types.js';

export interface ErrorHandlerOptions {
  /** Add the wrapped cause, the model output and the stack trace */
  verbose?: boolean;
  json?: boolean;
}

/**
 * Shape of `--json` error output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Underlying failure of a network, database or model call */
  cause?: string;
  /** Subprocess that failed or timed out */
  command?: string;
  /** Excerpt of the model response that could not be parsed */
  raw?: string;
  stack?: string;
}

const UNEXPECTED_HINT = 'Run with --verbose for more details';

function toReport(error: unknown): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }
  if (!(error instanceof CLIError)) {
    return { error: error.message, code: 1, hint: UNEXPECTED_HINT, stack: error.stack };
  }

  const report: ErrorOutput = {
    error: error.message,
    code: error.code,
    hint: error.hint,
    stack: error.stack,
  };
  if (error instanceof TransientIOError || error instanceof DatabaseError) {
    report.cause = error.cause?.message;
  } else if (error instanceof MalformedOutputError) {
    report.raw = error.raw;
  } else if (error instanceof CommandTimeoutError) {
    report.command = error.command;
  }
  return report;
}

/** Fields shown only under --verbose */
function trimForDisplay(report: ErrorOutput, verbose: boolean): ErrorOutput {
  if (verbose) {
    // The verbose hint is redundant once the stack is shown
    return report.hint === UNEXPECTED_HINT ? { ...report, hint: undefined } : report;
  }
  return { ...report, cause: undefined, raw: undefined, stack: undefined };
}

function renderText(report: ErrorOutput): string {
  const lines = [chalk.red('Error: ') + report.error];
  if (report.hint) lines.push(chalk.dim('Hint: ') + report.hint);
  if (report.cause) lines.push(chalk.dim('Cause: ') + report.cause);
  if (report.raw !== undefined) {
    lines.push(chalk.dim('Model output:'), report.raw || '(empty)');
  }
  if (report.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(report.stack));
  }
  return lines.join('\n');
}

export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const report = trimForDisplay(toReport(error), verbose);

  if (json) {
    return JSON.stringify(report, null, 2);
  }
  return renderText(report);
}

/**
 * Exit code for an error. Warden errors carry their own (2 config, 3 not
 * found, 7 endpoint, 8 model output, 9 timeout); anything else exits 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` and `unhandledRejection`. Options are
 * read when an error arrives, after the command line has been parsed.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions());
}
