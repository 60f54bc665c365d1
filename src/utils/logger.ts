/**
 * Logger
 *
 * Leveled logger writing to stderr. stdout is left alone so the bridge can
 * run under a supervisor that captures it separately.
 *
 * Level and format come from LOG_LEVEL / LOG_FORMAT unless set explicitly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

export type LogContext = Record<string, unknown> | Error;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  /** Component name shown with every line */
  source?: string;
  level?: LogLevel;
  format?: LogFormat;
  /** Output sink, stderr by default */
  write?: (line: string) => void;
  /** Level and format fall back to the parent's when not set */
  parent?: Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function formatFromEnv(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'text';
}

function normalizeContext(context?: LogContext): Record<string, unknown> | undefined {
  if (context === undefined) return undefined;
  if (context instanceof Error) {
    return { error: context.message, name: context.name, stack: context.stack };
  }
  return context;
}

export class Logger {
  private level: LogLevel | undefined;
  private format: LogFormat | undefined;
  private readonly source?: string;
  private readonly parent?: Logger;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.source = options.source;
    this.level = options.level;
    this.format = options.format;
    this.parent = options.parent;
    this.write = options.write ?? options.parent?.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? levelFromEnv();
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  getFormat(): LogFormat {
    return this.format ?? this.parent?.getFormat() ?? formatFromEnv();
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Create a logger for a sub-component sharing this logger's sink
   */
  child(source: string): Logger {
    return new Logger({
      source: this.source ? `${this.source}:${source}` : source,
      parent: this,
    });
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const ctx = normalizeContext(context);

    if (this.getFormat() === 'json') {
      this.write(JSON.stringify({ timestamp, level, source: this.source, message, ...ctx }));
      return;
    }

    const source = this.source ? ` [${this.source}]` : '';
    const suffix = ctx && Object.keys(ctx).length > 0 ? ` ${JSON.stringify(ctx)}` : '';
    this.write(`${timestamp} ${level.toUpperCase().padEnd(5)}${source} ${message}${suffix}`);
  }
}

export const logger = new Logger();

/**
 * Component logger inheriting the process-wide level and format
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger({ parent: logger, ...options });
}

export function getLogger(): Logger {
  return logger;
}
