export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  kind?: string;
  collaborator?: string;
}

export interface LogEntry {
  ts: number;
  level: LogLevel;
  msg: string;
  component: string;
  error?: SerializedError;
  // Additional structured data
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown, meta?: object): void;

  // Create a child logger with additional context (e.g. component name)
  child(meta: object): Logger;
}
