/**
 * Error Handling and Logging Infrastructure
 *
 * Error taxonomy for the bulk migrator plus a structured logger with console
 * and file sinks. Every failure carries the underlying driver or utility
 * diagnostic text verbatim in its message.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getLoggingConfig } from './environment-config';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  DATABASE = 'database',
  NETWORK = 'network',
  POLICY = 'policy',
  EXTERNAL_TOOL = 'external_tool',
  CONFIGURATION = 'configuration'
}

// ===== CUSTOM ERROR CLASSES =====

export class MigrationBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to structured log format
   */
  toLogFormat(): LogEntry {
    return {
      timestamp: this.timestamp,
      level: this.severity === ErrorSeverity.LOW ? LogLevel.WARN : LogLevel.ERROR,
      message: this.message,
      error_code: this.errorCode,
      category: this.category,
      severity: this.severity,
      context: this.context,
      stack_trace: this.stack
    };
  }
}

/** Network, authentication or protocol failure while opening a connection. */
export class ConnectionError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONNECTION_ERROR', ErrorCategory.NETWORK, ErrorSeverity.HIGH, context);
  }
}

/** Catalog query failure. */
export class QueryError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'QUERY_ERROR', ErrorCategory.DATABASE, ErrorSeverity.HIGH, context);
  }
}

export class CreateError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CREATE_ERROR', ErrorCategory.DATABASE, ErrorSeverity.HIGH, context);
  }
}

export class DropError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DROP_ERROR', ErrorCategory.DATABASE, ErrorSeverity.HIGH, context);
  }
}

/**
 * Non-zero exit (or spawn failure) of an external utility. `stderr` is kept
 * exactly as the utility wrote it.
 */
export class ExternalToolError extends MigrationBaseError {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    message: string,
    errorCode: string,
    exitCode: number | null,
    stderr: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, errorCode, ErrorCategory.EXTERNAL_TOOL, ErrorSeverity.HIGH, {
      ...context,
      exit_code: exitCode
    });
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ExportError extends ExternalToolError {
  constructor(message: string, exitCode: number | null, stderr: string, context: Record<string, unknown> = {}) {
    super(message, 'EXPORT_ERROR', exitCode, stderr, context);
  }
}

export class ImportError extends ExternalToolError {
  constructor(message: string, exitCode: number | null, stderr: string, context: Record<string, unknown> = {}) {
    super(message, 'IMPORT_ERROR', exitCode, stderr, context);
  }
}

/** Policy refusal: the database is already on the destination and overwrite is off. */
export class AlreadyExistsError extends MigrationBaseError {
  constructor(database: string) {
    super(
      `Database '${database}' exists on destination. Use --overwrite to replace.`,
      'ALREADY_EXISTS',
      ErrorCategory.POLICY,
      ErrorSeverity.LOW,
      { database }
    );
  }
}

export class ConfigurationError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context);
  }
}

/**
 * Message of an arbitrary thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// ===== LOGGING INFRASTRUCTURE =====

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error_code?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  stack_trace?: string;
  correlation_id?: string;
  job_id?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  enableStructuredLogging: boolean;
}

export class Logger {
  private config: LoggerConfig;
  private correlationId: string | null = null;
  private jobId: string | null = null;
  private currentLogFile: string | null = null;

  constructor(config?: Partial<LoggerConfig>) {
    const loggingConfig = getLoggingConfig();

    this.config = {
      level: parseLogLevel(loggingConfig.level),
      enableConsole: true,
      enableFile: loggingConfig.enableFileLogging,
      logDirectory: loggingConfig.logDirectory,
      enableStructuredLogging: loggingConfig.format === 'json',
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Set correlation ID for invocation tracing
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  /**
   * Scope subsequent entries to one migration job
   */
  setJobId(jobId: string | null): void {
    this.jobId = jobId;
  }

  clearContext(): void {
    this.correlationId = null;
    this.jobId = null;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorContext = error instanceof MigrationBaseError
      ? { ...context, ...error.context, error_code: error.errorCode, error_message: error.message }
      : error instanceof Error
        ? { ...context, error_message: error.message, stack_trace: error.stack }
        : { ...context, error_message: error === undefined ? undefined : String(error) };

    this.log(LogLevel.ERROR, message, errorContext);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLogEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      correlation_id: this.correlationId || undefined,
      job_id: this.jobId || undefined
    });
  }

  private writeLogEntry(entry: LogEntry): void {
    const formattedEntry = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, formattedEntry);
    }

    if (this.config.enableFile) {
      this.writeToFile(formattedEntry);
    }
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({
        ...entry,
        timestamp: entry.timestamp.toISOString()
      });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const correlation = entry.correlation_id ? `[${entry.correlation_id}] ` : '';
    const job = entry.job_id ? `[${entry.job_id}] ` : '';
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${correlation}${job}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    if (!this.currentLogFile) {
      return;
    }

    try {
      fs.appendFileSync(this.currentLogFile, message + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    return levels.indexOf(level) >= levels.indexOf(this.config.level);
  }

  private ensureLogDirectory(): void {
    if (!this.config.enableFile) {
      return;
    }

    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
    } catch (error) {
      console.error('Failed to create log directory:', error);
      this.config.enableFile = false;
    }
  }

  private initializeLogFile(): void {
    if (!this.config.enableFile) {
      return;
    }

    const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    this.currentLogFile = path.join(this.config.logDirectory, `migration-${date}.log`);
  }
}

/**
 * Parse log level from string, falling back to info
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

// ===== GLOBAL INSTANCES =====

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * Generate correlation ID for invocation tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}
