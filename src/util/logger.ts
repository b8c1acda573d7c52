export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  VALIDATION = 'validation',
  MODEL = 'model'
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
  verboseMode?: boolean;
}

/**
 * Where formatted log lines end up. `console` satisfies it.
 */
export interface LogSink {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger interface for standardized logging across the application
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: Record<string, unknown>): void;
  validation(message: string, context?: Record<string, unknown>): void;
  model(message: string, context?: Record<string, unknown>): void;
  marker(message: string): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
}

/**
 * Detect if running in development mode
 * @returns True if running in development mode
 */
export function isRunningInDevMode(): boolean {
  if (process.env.NODE_ENV === 'development') {
    return true;
  }

  return process.env.BSEM_LOG_LEVEL?.toLowerCase() === 'debug';
}

/**
 * Parse a textual level name (case-insensitive)
 * @returns The level, or undefined for unknown names
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'none': return LogLevel.NONE;
    default: return undefined;
  }
}

function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 * @param value Value to format
 * @returns Formatted string representation
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value, null, 2);
    } catch {
      return `[Object: circular or too complex to stringify]`;
    }
  }

  return String(value);
}

export class ConsoleLogger implements Logger {
  private sink: LogSink;
  private logLevel: LogLevel;
  private logPrefix: string;
  private enabledCategories: Set<LogCategory>;
  private includeTimestamps: boolean;
  private verboseMode: boolean;

  constructor(sink: LogSink = console, options: LoggerConfig = {}) {
    this.sink = sink;
    this.logLevel = options.level ?? LogLevel.INFO;
    this.logPrefix = options.prefix ? `[${options.prefix}] ` : '';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.verboseMode = options.verboseMode ?? isRunningInDevMode();

    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  /**
   * Get the log prefix including the timestamp if enabled
   */
  private getLogPrefix(): string {
    const timestamp = this.includeTimestamps ? `[${getFormattedTimestamp()}] ` : '';
    return timestamp + this.logPrefix;
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.debug(`Log level set to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.isCategoryEnabled(LogCategory.GENERAL)) {
      // Debug output only in verbose mode
      if (this.verboseMode) {
        this.sink.log(`DEBUG: ${this.getLogPrefix()}${message}`, ...args);
      }
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`INFO: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  /**
   * Log a validation-related message
   */
  public validation(message: string, context?: Record<string, unknown>): void {
    this.categorized(LogCategory.VALIDATION, 'VALIDATION', message, context);
  }

  /**
   * Log a model-stage message
   */
  public model(message: string, context?: Record<string, unknown>): void {
    this.categorized(LogCategory.MODEL, 'MODEL', message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (context) {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  public error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (error instanceof Error) {
        if (context) {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error, this.formatValue(context));
        } else {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error);
        }
      } else if (context) {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  /**
   * Log a stage banner
   */
  public marker(message: string): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.sink.log(`${this.getLogPrefix()}===== ${message} =====`);
    }
  }

  private categorized(
    category: LogCategory,
    label: string,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(category)) {
      const contextStr = context ? this.formatValue(context) : '';
      this.sink.log(`${label}: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }
}
