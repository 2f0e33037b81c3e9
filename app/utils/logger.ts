export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | undefined>;

/**
 * Receives one formatted line per log call. Swapped out in tests.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  verbose: '\x1b[94m', // Light blue
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

export const consoleSink: LogSink = (level, line) => {
  const color = LOG_COLORS[level];
  if (level === 'error' || level === 'warn') {
    console.error(`${color}${line}${RESET}`);
  } else {
    console.log(`${color}${line}${RESET}`);
  }
};

/**
 * Render structured fields as `key=value` pairs, skipping undefined values.
 * Values containing whitespace are quoted.
 */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      const text = String(value);
      return /\s/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`;
    })
    .join(' ');
}

/**
 * Leveled logger with a prefix, optional timestamps and structured fields
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;
  private timestamps: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || 'info';
    this.prefix = options.prefix || '';
    this.timestamps = options.timestamps ?? true;
    this.sink = options.sink ?? consoleSink;
  }

  private format(level: LogLevel, message: string, fields?: LogFields): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);

    if (this.prefix) {
      parts.push(this.prefix);
    }

    parts.push(message);

    if (fields) {
      const rendered = formatFields(fields);
      if (rendered) parts.push(rendered);
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }

    this.sink(level, this.format(level, message, fields));
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  verbose(message: string, fields?: LogFields): void {
    this.log('verbose', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setTimestamps(enabled: boolean): void {
    this.timestamps = enabled;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /**
   * Create a child logger with a new prefix. The child keeps the parent's
   * level and sink as they are at the time of the call.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}${prefix}` : prefix,
      timestamps: this.timestamps,
      sink: this.sink,
    });
  }
}

// Default logger instance
export const logger = new Logger();
