export { ConsoleLogger, NoopLogger, LOG_LEVELS, isLogLevel } from './logging.js';
export type { Logger, LogLevel, LogContext, LogWriter } from './logging.js';
