/**
 * @drive-verify/utils
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
export {
  safeWriteFile,
  safeReadFile,
  readRange,
  describeFsError,
} from './file.js';

// Path utilities
export {
  getExtension,
  computeRelativePath,
  charLength,
} from './path.js';

// Time utilities
export {
  formatDuration,
  fileTimestamp,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
