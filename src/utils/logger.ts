/**
 * Levelled Logger
 *
 * Writes formatted lines to a pluggable sink (console by default).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

export interface LoggerOptions {
  level?: string;
  sink?: LogSink;
  scope?: string;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = this.parseLevel(options.level ?? process.env['LOG_LEVEL'] ?? 'info');
    this.sink = options.sink ?? consoleSink;
    this.scope = options.scope;
  }

  private parseLevel(level: string): LogLevel {
    const normalized = level.toLowerCase();
    return isLogLevel(normalized) ? normalized : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}]`;
    if (this.scope) {
      line += ` [${this.scope}]`;
    }
    line += ` ${message}`;
    if (meta) {
      line += ` ${JSON.stringify(meta)}`;
    }
    return line;
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog(level)) {
      this.sink(level, this.formatMessage(level, message, meta));
    }
  }

  /**
   * Logger sharing this one's level and sink, tagging every line with `scope`
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }
}

export const logger = new Logger();
