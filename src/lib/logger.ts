/**
 * Structured Logger
 * Leveled logger that is built once at start-up and handed to each component.
 * Features:
 *   - text (human) or JSON (machine) line format
 *   - minimum level filtering
 *   - per-component child loggers sharing one configuration
 *   - error serialisation with optional stack
 *
 * Everything is written to stderr: stdout belongs to the report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export interface LogContext {
  /** Request URL or endpoint */
  url?: string;
  /** HTTP method */
  method?: string;
  /** Attempt number (1-based) */
  attempt?: number;
  /** Elapsed time in milliseconds */
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'info') */
  minLevel?: LogLevel;
  /** Line format (default: 'text') */
  format?: LogFormat;
  /** Custom formatter, overrides `format` */
  formatter?: (entry: LogEntry) => string;
  /** Include stack traces in JSON output (default: false) */
  includeStack?: boolean;
}

/**
 * What components depend on. Tests pass a stub of this.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(component: string): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `[hh:mm:ss] message`, local time
 */
export function textFormatter(entry: LogEntry): string {
  const date = new Date(entry.timestamp);
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  const cause = entry.error ? ` (${entry.error.message})` : '';
  return `[${time}] ${entry.message}${cause}`;
}

export function jsonFormatter(entry: LogEntry): string {
  return JSON.stringify(entry);
}

interface SharedState {
  minLevel: LogLevel;
  formatter: (entry: LogEntry) => string;
  includeStack: boolean;
}

export class StructuredLogger implements Logger {
  private component: string;
  private state: SharedState;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.state = {
      minLevel: config.minLevel ?? 'info',
      formatter: config.formatter ?? (config.format === 'json' ? jsonFormatter : textFormatter),
      includeStack: config.includeStack ?? false,
    };
  }

  /**
   * Logger for another component, sharing this one's level and formatter
   */
  child(component: string): StructuredLogger {
    const logger = new StructuredLogger(component);
    logger.state = this.state;
    return logger;
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

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.state.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
    };
    if (context) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = this.serializeError(error);
    }

    console.error(this.state.formatter(entry));
  }

  private serializeError(error: unknown): NonNullable<LogEntry['error']> {
    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        name: error.name,
        message: error.message,
        code,
        stack: this.state.includeStack ? error.stack : undefined,
      };
    }
    return { name: 'Error', message: String(error) };
  }
}

/**
 * Root logger for the process, built from CLI flags
 */
export function createLogger(options: { verbose?: boolean; quiet?: boolean; format?: LogFormat } = {}): StructuredLogger {
  const minLevel: LogLevel = options.verbose ? 'debug' : options.quiet ? 'warn' : 'info';
  return new StructuredLogger('cli', {
    minLevel,
    format: options.format,
    includeStack: options.verbose ?? false,
  });
}

/**
 * Keep enough of a secret to recognise it in a log line
 */
export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '****';
  }
  return `${token.slice(0, 4)}…`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
