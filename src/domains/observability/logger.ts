import type { Logger, LogEntry, LogFormat, LogLevel, SerializedError } from './types';
import { isPipelineError } from '../../core/errors';

// Simple color map for development console output
const COLORS = {
  debug: '\x1b[34m', // Blue
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function serializeError(error: unknown): SerializedError {
  if (isPipelineError(error)) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      kind: error.kind,
      collaborator: error.collaborator,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

export class RelayLogger implements Logger {
  private context: Record<string, unknown>;
  private level: LogLevel;
  private format: LogFormat;
  private static listeners: ((entry: LogEntry) => void)[] = [];

  public static addListener(listener: (entry: LogEntry) => void) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private static LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
    this.context = {
      component: options.component || 'App',
      ...context
    };
    this.level = options.level || 'info';
    this.format = options.format || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
  }

  /** Reconfigures this logger in place; children created later inherit it. */
  configure(options: Omit<LoggerOptions, 'component'>) {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
  }

  private shouldLog(level: LogLevel): boolean {
    return RelayLogger.LEVEL_VALUES[level] >= RelayLogger.LEVEL_VALUES[this.level];
  }

  private output(level: LogLevel, msg: string, meta: object = {}, error?: unknown) {
    if (!this.shouldLog(level)) return;

    const component = typeof this.context.component === 'string' ? this.context.component : 'App';
    const entry: LogEntry = {
      ...this.context,
      ...meta,
      ts: Date.now(),
      level,
      msg,
      component,
    };

    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }

    RelayLogger.listeners.forEach(l => {
      try {
        l(entry);
      } catch (e) {
        console.error('Error in log listener:', e);
      }
    });
  }

  private prettyPrint(entry: LogEntry) {
    const { ts, level, msg, component, error, ...rest } = entry;

    const isoString = new Date(ts).toISOString();
    const timePart = isoString.split('T')[1];
    const time = timePart ? timePart.slice(0, -1) : isoString;

    const levelColor = COLORS[level];
    const reset = COLORS.reset;
    const dim = COLORS.dim;

    const componentStr = component ? ` [${component}]` : '';

    console.log(
      `${dim}${time}${reset} ${levelColor}${level.toUpperCase().padEnd(5)}${reset}${componentStr} ${msg}`
    );

    if (Object.keys(rest).length > 0) {
      console.log(`${dim}${JSON.stringify(rest)}${reset}`);
    }

    if (error) {
      const origin = error.collaborator ? ` (${error.collaborator})` : '';
      console.log(`${levelColor}${error.name}${origin}: ${error.message}${reset}`);
      if (error.stack && level === 'error') {
        console.log(`${dim}${error.stack}${reset}`);
      }
    }
  }

  debug(msg: string, meta?: object) {
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: object) {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: object) {
    this.output('warn', msg, meta);
  }

  error(msg: string, error?: unknown, meta?: object) {
    this.output('error', msg, meta, error);
  }

  child(meta: object): Logger {
    return new RelayLogger(
      {
        level: this.level,
        format: this.format,
      },
      { ...this.context, ...meta }
    );
  }
}

// Global default logger
export const rootLogger = new RelayLogger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  component: 'Root'
});
