/**
 * Log levels for filtering output.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  PERF = 4  // Performance measurements
}

/**
 * Structured log entry
 */
interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  metadata?: Record<string, unknown>;
  stack?: string;
  duration?: number;
}

/**
 * Anything log lines can be written to (process.stderr, a test buffer).
 */
export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Logger interface for dependency injection.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
  measure<T>(component: string, operation: string, fn: () => Promise<T>, metadata?: Record<string, unknown>): Promise<T>;
  setLevel(level: LogLevel): void;
}

/**
 * Logging service for the makemock CLI.
 *
 * Writes human-readable lines to a sink, standard error in the CLI, so that
 * standard output only ever carries generated code.
 *
 * Usage:
 * ```typescript
 * this.logger.debug('[DeclarationParser] Skipped statement', statement);
 * this.logger.error('Failed to write output', writeError);
 * await this.logger.measure('Cli', 'Read input', async () => fs.readFile(path));
 * ```
 */
export class LoggerService implements ILogger {
  private sink: LogSink;
  private currentLevel: LogLevel = LogLevel.INFO;

  constructor(sink: LogSink, level: LogLevel = LogLevel.INFO) {
    this.sink = sink;
    this.currentLevel = level;
  }

  /**
   * Set the minimum log level to display.
   */
  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.INFO) {
      this.log('INFO', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.WARN) {
      this.log('WARN', message, args);
    }
  }

  /**
   * Log an error message with optional error object.
   */
  error(message: string, error?: unknown): void {
    if (this.currentLevel <= LogLevel.ERROR) {
      let fullMessage = message;
      let stack: string | undefined;

      if (error !== undefined && error !== null) {
        if (error instanceof Error) {
          fullMessage += `: ${error.message}`;
          stack = error.stack;
        } else if (typeof error === 'object') {
          fullMessage += `: ${JSON.stringify(error)}`;
        } else {
          fullMessage += `: ${String(error)}`;
        }
      }

      this.logStructured('ERROR', fullMessage, undefined, { stack });
    }
  }

  /**
   * Log performance measurement. Shown only at debug verbosity.
   */
  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void {
    if (this.currentLevel <= LogLevel.DEBUG) {
      this.logStructured('PERF', `[${component}] ${operation}`, metadata, { duration: durationMs });
    }
  }

  /**
   * Measure execution time of an async operation
   */
  async measure<T>(
    component: string,
    operation: string,
    fn: () => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.perf(component, operation, duration, metadata);
      return result;
    } catch (error: unknown) {
      const duration = performance.now() - start;
      this.error(`[${component}] ${operation} failed after ${duration.toFixed(2)}ms`, error);
      throw error;
    }
  }

  private logStructured(level: string, message: string, metadata?: Record<string, unknown>, extra?: { stack?: string; duration?: number }): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      metadata,
      ...(extra?.stack && { stack: extra.stack }),
      ...(extra?.duration !== undefined && { duration: extra.duration })
    };

    this.sink.write(this.formatForConsole(entry) + '\n');
  }

  private formatForConsole(entry: LogEntry): string {
    const timestamp = entry.timestamp.split('T')[1]?.substring(0, 8) || '';
    const level = entry.level.padEnd(5);
    let message = `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.metadata?.['args'] !== undefined) {
      message += ` ${JSON.stringify(entry.metadata['args'])}`;
    }
    if (entry.duration !== undefined) {
      message += ` (${entry.duration.toFixed(2)}ms)`;
    }
    // Stack traces only at debug verbosity
    if (entry.stack && this.currentLevel <= LogLevel.DEBUG) {
      message += `\n${entry.stack}`;
    }

    return message;
  }

  private log(level: string, message: string, args: unknown[]): void {
    const metadata = args.length > 0 ? { args: args.map(a => this.stringify(a)) } : undefined;
    this.logStructured(level, message, metadata);
  }

  /**
   * Safely stringify any value for logging.
   */
  private stringify(value: unknown): string {
    if (value === null) {
      return 'null';
    }
    if (value === undefined) {
      return 'undefined';
    }
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }

    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
}

/**
 * Null logger for testing or disabled logging scenarios.
 */
export class NullLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  perf(): void {}
  async measure<T>(_component: string, _operation: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
  setLevel(): void {}
}
