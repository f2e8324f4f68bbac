/**
 * @ctxmirror/core - Shared types, configuration, path resolution and logging.
 * This is the foundation package that all other ctxmirror packages depend on.
 */

// Types
export * from './types.js';

// Config
export {
  CONFIG_FILENAME,
  loadConfig,
  parseConfig,
  writeDefaultConfig,
  getDefaultConfig,
} from './config.js';

// Paths
export { DATA_DIR_NAME, resolveIdeFlavor, resolvePathSet } from './paths.js';

// Errors
export {
  SyncError,
  ConfigError,
  toSyncError,
  getFailureReason,
  type SyncErrorCode,
} from './errors.js';

// Logger
export {
  Logger,
  createMemoryLogger,
  initLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logger.js';

// Utils
export {
  generateId,
  now,
  hash,
  isErrnoException,
  sleep,
  slugify,
  findProjectRoot,
} from './utils.js';
