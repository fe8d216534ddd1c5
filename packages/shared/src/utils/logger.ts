import type { ILogger, LogContext, LogLevel } from './logger-interface';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

function isLogLevel(level: string): level is LogLevel {
  return level in LEVEL_PRIORITY;
}

/**
 * Resolve the active level: LOG_LEVEL wins, otherwise derived from NODE_ENV
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toUpperCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }

  switch (env.NODE_ENV) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return 'INFO';
  }
}

class LoggerImpl implements ILogger {
  private readonly level: LogLevel;

  constructor(
    private readonly bound: LogContext = {},
    level?: LogLevel
  ) {
    this.level = level ?? resolveLogLevel();
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context: LogContext): string {
    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...context,
      });
    }

    const { component } = context;
    const tag = component ? ` [${component}]` : '';

    return `${LEVEL_COLOR[level]}[${level}]${RESET}${tag} ${message}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, { ...this.bound, ...context });

    if (level === 'ERROR' || level === 'FATAL') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }

  /**
   * Child loggers merge the bound context and inherit the parent's level unless one is given
   */
  child(context: LogContext, level: LogLevel = this.level): ILogger {
    return new LoggerImpl({ ...this.bound, ...context }, level);
  }
}

export const logger = new LoggerImpl();
export default logger;

/**
 * Logger that drops everything; handy for tests that assert on other output
 */
export class SilentLogger implements ILogger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
  child(): ILogger {
    return this;
  }
}
