/**
 * Console-backed logger with bracketed component prefixes ("[kindred:memory]").
 * Components receive a Logger instance; there is no global logger.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger interface accepted by every component
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Derive a logger whose prefix is extended with `scope` */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  /** Prefix shown in brackets (default: "kindred") */
  prefix?: string;
  /** Minimum level written (default: "info") */
  level?: LogLevel;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("debug")) console.debug(this.format(message), ...this.extra(data));
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) console.log(this.format(message), ...this.extra(data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) console.warn(this.format(message), ...this.extra(data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) console.error(this.format(message), ...this.extra(data));
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.prefix}:${scope}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return `[${this.prefix}] ${message}`;
  }

  private extra(data?: Record<string, unknown>): unknown[] {
    return data && Object.keys(data).length > 0 ? [data] : [];
  }
}

/**
 * Create a logger that writes to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(options.prefix ?? "kindred", options.level ?? "info");
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
