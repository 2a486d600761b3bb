export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.SILENT]: 100,
};

/** Known context fields lifted to top-level entry fields */
const KNOWN_CONTEXT_FIELDS = [
  'component', 'queryId', 'correlationId', 'transport',
  'operation', 'duration', 'statusCode', 'attempt',
] as const;

export interface LogContext {
  component?: string | undefined;
  queryId?: string | undefined;
  correlationId?: string | undefined;
  transport?: string | undefined;
  operation?: string | undefined;
  duration?: number | undefined;
  statusCode?: number | undefined;
  attempt?: number | undefined;
  [key: string]: unknown;
}

export interface ExceptionInfo {
  type: string;
  message: string;
  code?: string;
  stackTrace?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  queryId?: string;
  correlationId?: string;
  transport?: string;
  operation?: string;
  durationMs?: number;
  statusCode?: number;
  attempt?: number;
  metadata?: Record<string, string>;
  exception?: ExceptionInfo;
}

/**
 * Logger seam used throughout the connector. Callers may pass their own
 * implementation through `ConnectOptions.logger`.
 */
export interface ConnectorLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  child(context: LogContext): ConnectorLogger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  const consoleFnMap: Record<LogLevel, (msg: string) => void> = {
    [LogLevel.DEBUG]: console.debug,
    [LogLevel.INFO]: console.info,
    [LogLevel.WARN]: console.warn,
    [LogLevel.ERROR]: console.error,
    [LogLevel.SILENT]: () => undefined,
  };
  consoleFnMap[level](line);
};

/**
 * Writes one JSON object per entry through the console function for its
 * level. Entries below the threshold are dropped.
 */
export class StructuredLogger implements ConnectorLogger {
  private static readonly SERVICE_ID = 'dataquery-connector';

  constructor(
    private readonly level: LogLevel = LogLevel.WARN,
    private readonly baseContext: LogContext = {},
    private readonly sink: LogSink = consoleSink
  ) {}

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  child(context: LogContext): ConnectorLogger {
    return new StructuredLogger(this.level, { ...this.baseContext, ...context }, this.sink);
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry = this.buildEntry(level, message, context);
    if (error) {
      entry.exception = this.buildExceptionInfo(error);
    }
    this.sink(level, JSON.stringify({ ...entry, service: StructuredLogger.SERVICE_ID }));
  }

  private buildExceptionInfo(error: Error): ExceptionInfo {
    const info: ExceptionInfo = { type: error.name, message: error.message };
    if ('code' in error && typeof error.code === 'string') {
      info.code = error.code;
    }
    if (error.stack !== undefined) {
      info.stackTrace = error.stack;
    }
    return info;
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const merged: LogContext = { ...this.baseContext, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (merged.component !== undefined) entry.component = merged.component;
    if (merged.queryId !== undefined) entry.queryId = merged.queryId;
    if (merged.correlationId !== undefined) entry.correlationId = merged.correlationId;
    if (merged.transport !== undefined) entry.transport = merged.transport;
    if (merged.operation !== undefined) entry.operation = merged.operation;
    if (merged.duration !== undefined) entry.durationMs = merged.duration;
    if (merged.statusCode !== undefined) entry.statusCode = merged.statusCode;
    if (merged.attempt !== undefined) entry.attempt = merged.attempt;

    const metadata = this.extractMetadata(merged);
    if (Object.keys(metadata).length > 0) {
      entry.metadata = metadata;
    }
    return entry;
  }

  private extractMetadata(context: LogContext): Record<string, string> {
    const metadata: Record<string, string> = {};
    const knownFields = new Set<string>(KNOWN_CONTEXT_FIELDS);

    for (const [key, value] of Object.entries(context)) {
      if (!knownFields.has(key) && value != null) {
        metadata[key] = String(value);
      }
    }
    return metadata;
  }
}

/** Logger that drops everything. */
export const silentLogger: ConnectorLogger = new StructuredLogger(LogLevel.SILENT);
