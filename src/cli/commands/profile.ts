/**
 * Profile Command
 *
 *   warden profile list          - Built-in and configured model profiles
 *   warden profile show [name]   - Budgets of one profile (defaults to the active one)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { buildProfileCatalog, selectModelProfile, type ModelProfile } from '../../config/profiles.js';
import type { CommandContext } from '../types.js';

const PROFILE_FIELDS: Array<[keyof ModelProfile, string]> = [
  ['effectiveContextTokens', 'Effective context'],
  ['maxOutputTokens', 'Max output'],
  ['promptReserveTokens', 'Prompt reserve'],
  ['chunkTokenLimit', 'Chunk limit'],
  ['retrievalTopK', 'Retrieval top-k'],
  ['embeddingModel', 'Embedding model'],
  ['jsonRetries', 'JSON retries'],
  ['useConstrainedJson', 'Constrained JSON'],
  ['simplifyPrompts', 'Compact prompts'],
];

function describeValue(key: keyof ModelProfile, value: ModelProfile[keyof ModelProfile]): string {
  if (key === 'embeddingModel' && value === '') return '(configured embedding model)';
  if (typeof value === 'number' && key !== 'retrievalTopK' && key !== 'jsonRetries') {
    return `${value.toLocaleString()} tokens`;
  }
  return String(value);
}

export function createProfileCommand(getContext: () => CommandContext): Command {
  const profileCmd = new Command('profile').description('Inspect model profiles');

  profileCmd
    .command('list')
    .alias('ls')
    .description('List available model profiles')
    .action(() => {
      const ctx = getContext();
      const config = loadConfig();
      const catalog = buildProfileCatalog(config.profiles);
      const active = selectModelProfile({
        model: ctx.options.model ?? config.default_model,
        profile: ctx.options.profile ?? config.profile,
        overrides: config.profiles,
      }).name;

      if (ctx.options.json) {
        console.log(JSON.stringify({ active, profiles: [...catalog.values()] }, null, 2));
        return;
      }

      for (const profile of catalog.values()) {
        const marker = profile.name === active ? chalk.green('●') : ' ';
        ctx.log(
          `${marker} ${chalk.cyan(profile.name.padEnd(12))} ` +
            chalk.dim(
              `context ${profile.effectiveContextTokens.toLocaleString()}, ` +
                `output ${profile.maxOutputTokens.toLocaleString()}`
            )
        );
      }
    });

  profileCmd
    .command('show [name]')
    .description('Show the budgets of a profile (defaults to the active one)')
    .action((name: string | undefined) => {
      const ctx = getContext();
      const config = loadConfig();
      const profile = selectModelProfile({
        model: ctx.options.model ?? config.default_model,
        profile: name ?? ctx.options.profile ?? config.profile,
        overrides: config.profiles,
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(profile, null, 2));
        return;
      }

      ctx.log(chalk.bold(`Profile: ${profile.name}`));
      ctx.log('');
      for (const [key, label] of PROFILE_FIELDS) {
        ctx.log(`  ${chalk.dim(`${label}:`.padEnd(20))}${describeValue(key, profile[key])}`);
      }
    });

  return profileCmd;
}
