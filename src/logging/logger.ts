/**
 * Logger
 *
 * Levelled console logger with a bounded in-memory buffer of recent entries.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope: string;
  message: string;
  data?: Record<string, unknown>;
}

/** Anything console-shaped */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  maxBufferSize?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const ROOT_SCOPE = 'switchyard';
const DEFAULT_BUFFER_SIZE = 500;

interface LogBuffer {
  entries: LogEntry[];
  max: number;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly buffer: LogBuffer;
  readonly scope: string;

  constructor(options: LoggerOptions = {}, scope: string = ROOT_SCOPE, buffer?: LogBuffer) {
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? console;
    this.scope = scope;
    this.buffer = buffer ?? { entries: [], max: options.maxBufferSize ?? DEFAULT_BUFFER_SIZE };
  }

  /**
   * Logger writing under `parent:scope`, sharing sink, level and buffer
   */
  child(scope: string): Logger {
    return new Logger({ level: this.level, sink: this.sink }, `${this.scope}:${scope}`, this.buffer);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  /**
   * Most recent entries, oldest first
   */
  getRecentLogs(limit?: number): LogEntry[] {
    const entries = this.buffer.entries;
    if (limit === undefined || limit >= entries.length) {
      return [...entries];
    }
    return entries.slice(entries.length - limit);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = { ts: Date.now(), level, scope: this.scope, message, data };
    this.buffer.entries.push(entry);
    if (this.buffer.entries.length > this.buffer.max) {
      this.buffer.entries.splice(0, this.buffer.entries.length - this.buffer.max);
    }

    const line = `[${this.scope}] ${message}${formatData(data)}`;
    switch (level) {
      case 'debug':
        this.sink.debug(line);
        break;
      case 'info':
        this.sink.log(line);
        break;
      case 'warn':
        this.sink.warn(line);
        break;
      case 'error':
        this.sink.error(line);
        break;
    }
  }
}

/**
 * key=value pairs appended to the message
 */
function formatData(data?: Record<string, unknown>): string {
  if (!data) {
    return '';
  }

  const pairs = Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Factory function
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
