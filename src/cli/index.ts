#!/usr/bin/env node
/**
 * warden CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createGapsCommand } from './commands/gaps.js';
import { createGraphCommand } from './commands/graph.js';
import { createIndexCommand } from './commands/index.js';
import { createLaunchCommand } from './commands/launch.js';
import { createProfileCommand } from './commands/profile.js';
import { createRiskCommand } from './commands/risk.js';
import { createScopeCommand } from './commands/scope.js';
import { createSearchCommand } from './commands/search.js';
import { createSummaryCommand } from './commands/summary.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// package.json sits two levels up from both src/cli and dist/cli
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
).version;

const program = new Command();

program
  .name('warden')
  .description('Design-aware review agents: scope checks and risk analysis over your project documents')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--profile <name>', 'Model profile to use (overrides config)')
  .option('--model <id>', 'Completion model to use (overrides config)')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('warden index design.md -p ledger -t technical_design')}   Index a design document
  ${chalk.cyan('warden summary ../ledger --key ledger')}                  Store a repository map
  ${chalk.cyan('warden scope -p ledger -r ../ledger --head feature/x')}   Check a branch against the design
  ${chalk.cyan('warden risk prd.md -p ledger')}                           Predict risks for a PRD
  ${chalk.cyan('warden search "refund flow" -p ledger')}                  Search indexed documents
  ${chalk.cyan('warden profile list')}                                    Show model profiles
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    info: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(message));
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root command after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    profile: opts.profile,
    model: opts.model,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createIndexCommand(getContext));
program.addCommand(createSummaryCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createGraphCommand(getContext));
program.addCommand(createScopeCommand(getContext));
program.addCommand(createRiskCommand(getContext));
program.addCommand(createLaunchCommand(getContext));
program.addCommand(createGapsCommand(getContext));
program.addCommand(createProfileCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: warden --help  to see available commands`
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every command's handling
  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
