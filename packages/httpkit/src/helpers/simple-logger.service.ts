import type { LevelLogger, LogLevel, LogListener, Logger, LogPayload } from '../types/logger.types.js';

const LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export type SimpleLoggerOptions = {
  level?: LogLevel;
  meta?: Record<string, unknown>;
  /** Set false to keep records off the console and only notify listeners. */
  console?: boolean;
};

/** Console logger printing `[LEVEL] message meta`. Children share the parent's listeners. */
export class SimpleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly meta: Record<string, unknown>;
  private readonly toConsole: boolean;
  private readonly listeners: LogListener[];

  readonly info: LevelLogger = (message, meta) => this.write('info', message, meta);
  readonly error: LevelLogger = (message, meta) => this.write('error', message, meta);
  readonly debug: LevelLogger = (message, meta) => this.write('debug', message, meta);
  readonly warn: LevelLogger = (message, meta) => this.write('warn', message, meta);

  constructor(options: SimpleLoggerOptions = {}, listeners: LogListener[] = []) {
    this.level = options.level ?? 'info';
    this.meta = options.meta ?? {};
    this.toConsole = options.console ?? true;
    this.listeners = listeners;
  }

  child(meta: Record<string, unknown>): Logger {
    return new SimpleLogger({
      level: this.level,
      meta: { ...this.meta, ...meta },
      console: this.toConsole,
    }, this.listeners);
  }

  addListener(callback: LogListener) {
    this.listeners.push(callback);
  }

  log(payload: LogPayload): void {
    this.write(payload.level, payload.msg, payload.meta, payload.time);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>, time = Date.now()) {
    if (LEVELS[level] < LEVELS[this.level]) {
      return;
    }

    const merged = { ...this.meta, ...meta };
    const payload: LogPayload = { level, msg: message, time, meta: merged };

    for (const listener of this.listeners) {
      listener(payload);
    }

    if (!this.toConsole) {
      return;
    }

    const consoleTarget =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    consoleTarget(
      `[${level.toUpperCase()}] ${message}`,
      Object.keys(merged).length ? merged : '',
    );
  }
}

export function createSimpleLogger(options?: SimpleLoggerOptions): Logger {
  return new SimpleLogger(options);
}
