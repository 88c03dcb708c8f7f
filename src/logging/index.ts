/**
 * Logging Module
 */

export { Logger, createLogger } from './logger';
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from './logger';
