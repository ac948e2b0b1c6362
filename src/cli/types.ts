import type { AppContext } from '../context.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
  /** Model profile name, overriding config.profile */
  profile?: string;
  /** Completion model, overriding config.default_model */
  model?: string;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities. Satisfies the core
 * Logger interface, so it is handed to the app context as its logger.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Log a message (respects --json flag) */
  log: (message: string) => void;
  /** Progress lines from the core (budget summaries); shown with --verbose */
  info: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Log a warning (suppressed under --json) */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
}

/**
 * Opens the core for one command. Commands close what they open.
 * Tests pass a factory that builds over an in-memory database.
 */
export type AppContextFactory = (ctx: CommandContext) => AppContext;
