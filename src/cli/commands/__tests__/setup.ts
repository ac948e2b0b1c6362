/**
 * Command Test Setup
 *
 * Commands run against a real app context over an in-memory database,
 * with scripted model replies and a hashing embedder. The context the
 * command sees ignores close() so the test can inspect the stores after
 * the command returns; the test closes the real one.
 */

import { Command } from 'commander';
import { vi } from 'vitest';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { EnvSchema } from '../../../config/env.js';
import type { Config } from '../../../config/schema.js';
import { createAppContext, type AppContext } from '../../../context.js';
import { LocalGitClient, type GitExecFn } from '../../../integrations/local-git.js';
import { HashingEmbeddingClient, ScriptedCompletionClient } from '../../../test-utils/index.js';
import type { AppContextFactory, CommandContext, GlobalOptions } from '../../types.js';

export interface TestApp {
  app: AppContext;
  openApp: AppContextFactory;
  completion: ScriptedCompletionClient;
}

export function createTestApp(replies: string[] = [], config: Partial<Config> = {}): TestApp {
  const completion = new ScriptedCompletionClient(replies);
  const app = createAppContext({
    config: { ...DEFAULT_CONFIG, ...config },
    env: EnvSchema.parse({ OPENAI_API_KEY: 'test-key' }),
    dbPath: ':memory:',
    completionClient: completion,
    embeddingClient: new HashingEmbeddingClient(),
  });
  const openApp: AppContextFactory = () => ({ ...app, close: () => undefined });
  return { app, openApp, completion };
}

/**
 * Same as `testApp.openApp`, but git clients run `gitOutputs` instead of
 * git. Keys are the arguments after `-C <dir>`, space-joined.
 */
export function withGitStub(testApp: TestApp, gitOutputs: Record<string, string>): AppContextFactory {
  const execFile = vi.fn<GitExecFn>(async (_cmd, args) => {
    const key = args.slice(2).join(' ');
    const stdout = gitOutputs[key];
    if (stdout === undefined) {
      throw Object.assign(new Error(`unexpected git call: ${key}`), { stderr: '' });
    }
    return { stdout, stderr: '' };
  });
  return (ctx) => ({
    ...testApp.openApp(ctx),
    createGitClient: (repoDir: string) => new LocalGitClient(repoDir, { execFile }),
  });
}

export interface CapturedContext {
  ctx: CommandContext;
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function createMockContext(options: Partial<GlobalOptions> = {}): CapturedContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const ctx: CommandContext = {
    options: { verbose: false, json: false, ...options },
    log: (msg: string) => logs.push(msg),
    info: vi.fn(),
    debug: vi.fn(),
    warn: (msg: string) => warnings.push(msg),
    error: (msg: string) => errors.push(msg),
  };
  return { ctx, logs, warnings, errors };
}

/**
 * Parse `args` with `cmd` registered on a fresh root program.
 */
export async function runCommand(cmd: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.addCommand(cmd);
  await program.parseAsync(['node', 'test', ...args]);
}
