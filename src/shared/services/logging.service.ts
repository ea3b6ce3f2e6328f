/**
 * Logging Service
 *
 * Structured logging for the daemon and the hint UI.
 * Uses the RFC 5424 severity ladder and writes to stderr.
 */

/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
];

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  component?: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Output sink for formatted log lines
 */
export type LogWriter = (line: string) => void;

const writeToStderr: LogWriter = (line) => {
  // stdout is left to the CLIs' own output
  console.error(line);
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Writes entries at or above a minimum level as formatted lines.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private readonly writer: LogWriter;

  private static readonly SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(minLevel: LogLevel = 'info', writer: LogWriter = writeToStderr) {
    this.minLevel = minLevel;
    this.writer = writer;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, undefined, context);
  }

  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, undefined, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, undefined, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, undefined, context, error);
  }

  /**
   * Record an entry on behalf of a component logger
   */
  log(
    level: LogLevel,
    message: string,
    component?: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (LoggingService.SEVERITY[level] < LoggingService.SEVERITY[this.minLevel]) {
      return;
    }
    this.writer(this.format({ level, message, timestamp: Date.now(), component, context, error }));
  }

  /**
   * One header line, then indented context and error lines
   */
  format(entry: LogEntry): string {
    const lines = [
      `[${new Date(entry.timestamp).toISOString()}] ${entry.level.toUpperCase().padEnd(8)} ` +
        `${entry.component ? `[${entry.component}] ` : ''}${entry.message}`,
    ];

    if (entry.context && Object.keys(entry.context).length > 0) {
      lines.push(`  Context: ${JSON.stringify(entry.context)}`);
    }
    if (entry.error) {
      lines.push(`  Error: ${entry.error.message}`);
      if (entry.error.stack) {
        lines.push(`  Stack: ${entry.error.stack}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a logger scoped to one component.
 *
 * Entries are routed through the global service at call time, so a later
 * setLogger() or setMinLevel() applies to loggers created earlier.
 */
export function createLogger(component: string): Logger {
  const emit = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    getLogger().log(level, message, component, context, error);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    notice: (message, context) => emit('notice', message, context),
    warning: (message, context) => emit('warning', message, context),
    error: (message, error, context) => emit('error', message, context, error),
    critical: (message, error, context) => emit('critical', message, context, error),
  };
}
