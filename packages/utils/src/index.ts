/**
 * @vidbatch/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Time and size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  isSpawnNotFound,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  writeFileAtomic,
  pathExists,
  removeFile,
  moveFile,
  errnoCode,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getBasename,
  normalizeExtension,
  toPosixPath,
  PARTIAL_OUTPUT_MARKER,
} from './path.js';

// Time utilities
export {
  formatDuration,
  formatRuntime,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

// Concurrency
export { Mutex } from './mutex.js';
