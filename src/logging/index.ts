export { createLoggingMiddleware } from './middleware.js';
export {
  matchPath,
  shouldExcludePath,
  extractQuery,
  generateRequestId,
  formatLogEntry,
  loggerHandler,
} from './utils.js';
export type {
  LogEntry,
  LogHandler,
  LevelResolver,
  LoggingConfig,
  PathPattern,
} from './types.js';
