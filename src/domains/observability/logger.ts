import type { Logger, LogEntry, LogFormat, LoggedError, LogLevel } from './types';

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

function toLoggedError(error: unknown): LoggedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const logged: LoggedError = {
    message: error.message,
    name: error.name,
    stack: error.stack,
  };
  if ('code' in error && typeof error.code === 'string') {
    logged.code = error.code;
  }
  return logged;
}

export class ConsoleLogger implements Logger {
  private context: Record<string, unknown>;
  private level: LogLevel;
  private minLevel: number;
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
      ...context,
    };
    this.level = options.level || 'info';
    this.minLevel = ConsoleLogger.LEVEL_VALUES[this.level];
    this.format = options.format || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
  }

  private shouldLog(level: LogLevel): boolean {
    return ConsoleLogger.LEVEL_VALUES[level] >= this.minLevel;
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
      entry.error = toLoggedError(error);
    }

    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }

    ConsoleLogger.listeners.forEach(l => {
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
      console.log(error.stack ?? `${error.name ?? 'Error'}: ${error.message}`);
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

  child(meta: { component?: string } & object): Logger {
    return new ConsoleLogger(
      { level: this.level, format: this.format },
      { ...this.context, ...meta }
    );
  }
}

export function createRootLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger({ component: 'Root', ...options });
}
