/**
 * Leveled, timestamped diagnostics for the provisioner.
 * Every line goes to stdout as `[YYYY-MM-DD HH:MM:SS] LEVEL: message`.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: (line: string) => void;
  clock?: () => Date;
}

export function parseLogLevel(value: string): LogLevel {
  const upper = value.toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  if (!match) {
    throw new Error(`Unknown log level: ${value}`);
  }
  return match;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class Logger {
  private entries: LogEntry[] = [];
  private readonly threshold: LogLevel;
  private readonly sink: (line: string) => void;
  private readonly clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.threshold = options.level ?? LogLevel.INFO;
    this.sink = options.sink ?? (line => console.log(line));
    this.clock = options.clock ?? (() => new Date());
  }

  log(level: LogLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) {
      return;
    }
    const entry: LogEntry = {
      level,
      message,
      timestamp: this.clock(),
      stack: error?.stack,
      context
    };
    this.entries.push(entry);
    this.output(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, error, context);
  }

  private output(entry: LogEntry): void {
    this.sink(`[${formatTimestamp(entry.timestamp)}] ${entry.level}: ${entry.message}`);
    if (entry.stack && this.threshold === LogLevel.DEBUG) {
      this.sink(entry.stack);
    }
  }

  getLogs(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.entries.filter(entry => entry.level === level);
    }
    return this.entries;
  }

  clearLogs(): void {
    this.entries = [];
  }
}
