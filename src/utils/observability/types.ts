export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fields merged into every record. `requestId` tags one validation call,
 * `runId` one scenario generation run.
 */
export type LogContext = {
  requestId?: string;
  runId?: string;
  domain?: string;
  scenario?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type LogFn = (event: string, data?: LogData) => void;

export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

export interface AppLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(context: LogContext): AppLogger;
}
