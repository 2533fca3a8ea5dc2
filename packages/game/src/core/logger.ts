/**
 * Logging sink injected into the world.
 *
 * The simulation never writes files; whatever owns the world decides where
 * lines go by choosing a Logger.
 */

export const LogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function defaultLogLevel(): LogLevel {
  return process.env.NODE_ENV === "production" ? LogLevel.WARN : LogLevel.INFO;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  readonly prefix?: string;
}

/**
 * Writes to the console, dropping lines below the configured level.
 */
export class ConsoleLogger implements Logger {
  private readonly minRank: number;
  private readonly prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minRank = LEVEL_RANK[options.level ?? defaultLogLevel()];
    this.prefix = options.prefix ?? "[Game]";
  }

  debug(message: string, fields?: LogFields): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write(LogLevel.ERROR, message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < this.minRank) return;
    const line = `${this.prefix} ${message}`;
    const args: unknown[] = fields ? [line, fields] : [line];
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      case LogLevel.INFO:
        console.info(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.ERROR:
        console.error(...args);
        break;
    }
  }
}

export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly fields?: LogFields;
}

/**
 * Keeps every line in memory. Meant for tests.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, fields?: LogFields): void {
    this.entries.push({ level: LogLevel.DEBUG, message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.entries.push({ level: LogLevel.INFO, message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.entries.push({ level: LogLevel.WARN, message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.entries.push({ level: LogLevel.ERROR, message, fields });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
