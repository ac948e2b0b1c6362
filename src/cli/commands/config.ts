/**
 * Config Command
 *
 *   warden config list [section]       - Values grouped the way config.toml is
 *   warden config get <key>            - One value, by dotted key
 *   warden config set <key> <value>    - Validate, then write config.toml
 *   warden config path                 - Where config.toml lives
 *
 * Failures throw ConfigError (exit 2) for the top-level handler to print.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, listConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';
import { ConfigError } from '../../errors/index.js';

const LIST_HINT = 'Run: warden config list  to see available keys';

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function sectionOf(key: string): string {
  const dot = key.indexOf('.');
  return dot === -1 ? '' : key.slice(0, dot);
}

/**
 * Render entries as config.toml reads: top-level keys first, then one
 * `[section]` block per table.
 */
export function formatConfigEntries(entries: Array<[string, unknown]>): string[] {
  const lines: string[] = [];
  const topLevel = entries.filter(([key]) => sectionOf(key) === '');
  for (const [key, value] of topLevel) {
    lines.push(`${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
  }

  let section = '';
  for (const [key, value] of entries) {
    const keySection = sectionOf(key);
    if (keySection === '') continue;
    if (keySection !== section) {
      if (lines.length > 0) lines.push('');
      lines.push(chalk.bold(`[${keySection}]`));
      section = keySection;
    }
    const name = key.slice(keySection.length + 1);
    lines.push(`  ${chalk.cyan(name)} = ${chalk.yellow(formatValue(value))}`);
  }
  return lines;
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect and edit ~/.warden/config.toml');

  configCmd
    .command('list [section]')
    .alias('ls')
    .description('List configuration values, optionally one section (e.g. git)')
    .action((section: string | undefined) => {
      const ctx = getContext();
      let entries = listConfig();
      if (section !== undefined) {
        entries = entries.filter(([key]) => sectionOf(key) === section);
        if (entries.length === 0) {
          throw new ConfigError(`Unknown config section: ${section}`, LIST_HINT);
        }
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }
      for (const line of formatConfigEntries(entries)) {
        ctx.log(line);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('get <key>')
    .description('Get a value (e.g. warden config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, LIST_HINT);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a value (e.g. warden config set git.timeout_ms 60000)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      const previous = getConfigValue(key);
      setConfigValue(key, value);
      const current = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, previous, value: current }));
        return;
      }
      const was = previous === undefined ? '' : chalk.dim(` (was ${formatValue(previous)})`);
      ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatValue(current))}${was}`);
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}
