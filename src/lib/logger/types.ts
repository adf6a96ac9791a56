/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2,
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

const LOG_LEVELS: Record<LogType, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  notice: LogLevel.NOTICE,
  success: LogLevel.SUCCESS,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  raw: LogLevel.RAW,
};

export function getLogLevel(type: LogType): LogLevel {
  return LOG_LEVELS[type];
}

export interface LogOptions {
  /** Values for the `{{name}}` placeholders of the message */
  params?: Record<string, unknown>;
}

/**
 * Where an entry came from. Set by LoggerService scopes, never by callers.
 */
export interface LogScope {
  /** Component, e.g. 'lifecycle-controller' */
  serviceName?: string;

  /** Rapp, capability or remote the entry is about */
  entityName?: string;

  /** Run of a rapp, so all lines of one run can be pulled together */
  runID?: string;
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry extends LogScope {
  timestamp: number;
  type: LogType;
  template: string; // "Stopping rapp ({{trigger}})"
  message: string; // "Stopping rapp (monitor)"
  params?: Record<string, unknown>;
  error?: unknown; // errorObject() only
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type SinkErrorHandler = (
  error: unknown,
  context: 'write' | 'close',
  sink: LogSink,
) => void;

export interface LoggerOptions {
  sinks?: LogSink[];
  onSinkError?: SinkErrorHandler;
}
