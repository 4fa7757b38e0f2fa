type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  timestamp: '\x1b[90m', // Gray
  context: '\x1b[90m', // Gray
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

interface LoggerOptions {
  minLevel: LogLevel;
  useJSON: boolean;
  supportsColor: boolean;
}

function optionsFromEnv(): LoggerOptions {
  const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return {
    minLevel: isLogLevel(envLevel) ? envLevel : 'info',
    // JSON lines in production, readable format in development
    useJSON: process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json',
    supportsColor:
      process.stdout.isTTY === true && process.env.NO_COLOR === undefined && process.env.FORCE_COLOR !== '0',
  };
}

export class Logger {
  constructor(
    private readonly options: LoggerOptions = optionsFromEnv(),
    private readonly bindings: LogContext = {},
  ) {}

  /** Logger that adds `bindings` to every line it writes */
  child(bindings: LogContext): Logger {
    return new Logger(this.options, { ...this.bindings, ...bindings });
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.options.minLevel];
  }

  private formatTimestamp(now: Date): string {
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`.padEnd(12);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const merged: LogContext = { ...this.bindings, ...context };
    let error: Error | undefined;
    if (merged.error instanceof Error) {
      error = merged.error;
      delete merged.error;
    }
    const hasContext = Object.keys(merged).length > 0;

    if (this.options.useJSON) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
      };
      if (hasContext) {
        entry.context = merged;
      }
      if (error) {
        entry.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      }
      return JSON.stringify(entry);
    }

    const color = this.options.supportsColor;
    const levelColor = color ? colors[level] : '';
    const reset = color ? colors.reset : '';
    const timestampColor = color ? colors.timestamp : '';
    const contextColor = color ? colors.context : '';

    const levelUpper = level.toUpperCase().padEnd(6);
    let output = `${timestampColor}${this.formatTimestamp(new Date())}${reset} ${levelColor}${levelUpper}${reset}${message}`;

    if (hasContext) {
      const contextPairs = Object.entries(merged)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      output += ` ${contextColor}${contextPairs}${reset}`;
    }

    if (error) {
      const errorColor = color ? colors.error : '';
      output += `\n${errorColor}  ${error.name}: ${error.message}${reset}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${timestampColor}  ${stackLines.join(`\n${timestampColor}  `)}${reset}`;
      }
    }

    return output;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  /** An `error` entry in the context is rendered with its stack */
  error(message: string, context?: LogContext): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, context));
    }
  }
}

export const logger = new Logger();
