import { performance } from 'perf_hooks';

/**
 * Structured Logger for scriptmender
 * Emits one JSON object per line on stderr; stdout belongs to the
 * generated script and to command results.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogContext {
  runId?: string;
  task?: string;
  attempt?: number;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: {
    [key: string]: number;
  };
}

export type LogSink = (line: string, level: LogLevel) => void;

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const stderrSink: LogSink = line => {
  process.stderr.write(line + '\n');
};

function errorCode(error: Error): string | number | undefined {
  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') return code;
  }
  return undefined;
}

class Logger {
  private logLevel: LogLevel;
  private serviceName: string;
  private environment: string;
  private baseContext: LogContext;
  private sink: LogSink;

  constructor(
    serviceName: string = 'scriptmender',
    logLevel: LogLevel = 'warn',
    environment: string = process.env.NODE_ENV || 'development',
    baseContext: LogContext = {},
    sink: LogSink = stderrSink
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.baseContext = baseContext;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error),
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    this.sink(JSON.stringify(logEntry), logEntry.level);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: { [key: string]: number }, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Time a function execution and log the result
   */
  async timeAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    this.debug(`Starting operation: ${operation}`, operationContext);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;

      this.metric(`Operation completed: ${operation}`,
        { duration, success: 1 },
        { ...operationContext, duration }
      );

      return result;
    } catch (error) {
      const duration = performance.now() - startTime;

      this.error(`Operation failed: ${operation}`,
        { ...operationContext, duration },
        error instanceof Error ? error : new Error(String(error))
      );

      throw error;
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      { ...this.baseContext, ...additionalContext },
      this.sink
    );
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };
