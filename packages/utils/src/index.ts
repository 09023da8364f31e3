/**
 * @mediaconv/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export { ensureDir, pathExists } from './file.js';

// Path utilities
export { getExtension, getBasename } from './path.js';

// Logger
export {
  logger,
  createLogger,
  setLogLevel,
  resolveLogLevel,
  isPrettyLogging,
  type Logger,
} from './logger.js';
