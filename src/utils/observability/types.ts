export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fields attached to every record logged inside a context.
 * `runId` identifies one replication run; `batch` the batch being processed.
 */
export type LogContext = {
  runId?: string;
  domain?: string;
  batch?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

/** One NDJSON line. */
export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  /** Logger whose records all carry `context`. */
  child(context: LogContext): AppLogger;
}
