/**
 * Opening the core from a command.
 */

import { createAppContext, type AppContext } from '../context.js';
import type { AppContextFactory, CommandContext } from './types.js';

export const openAppContext: AppContextFactory = (ctx) =>
  createAppContext({
    profile: ctx.options.profile,
    model: ctx.options.model,
    logger: ctx,
  });

/**
 * Run `fn` with a freshly opened app context, closing it afterwards
 * whether or not `fn` throws.
 */
export async function withAppContext<T>(
  ctx: CommandContext,
  openApp: AppContextFactory,
  fn: (app: AppContext) => Promise<T>
): Promise<T> {
  const app = openApp(ctx);
  try {
    return await fn(app);
  } finally {
    app.close();
  }
}
