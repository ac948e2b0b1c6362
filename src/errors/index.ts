/**
 * Error handling module
 *
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Unknown profile: qwen-3b', 'Try: warden profile list');
 */

export {
  CLIError,
  ResourceNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  TransientIOError,
  MalformedOutputError,
  CommandTimeoutError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
