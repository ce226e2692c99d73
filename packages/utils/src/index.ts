/**
 * @hls-kit/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time and size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  getFileSizeBytes,
  isFile,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  stripExtension,
} from './path.js';

// Type guards
export {
  isString,
  isDigitString,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  formatClock,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
