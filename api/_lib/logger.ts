export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Level-filtered console output tagged with `[prefix]`. */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = "info"
  ) {
    this.minLevel = LEVEL_ORDER[level];
  }

  private enabled(level: LogLevel) {
    return this.minLevel <= LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    if (context) console.debug(`[${this.prefix}] ${message}`, context);
    else console.debug(`[${this.prefix}] ${message}`);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    if (context) console.log(`[${this.prefix}] ${message}`, context);
    else console.log(`[${this.prefix}] ${message}`);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    if (context) console.warn(`[${this.prefix}] ${message}`, context);
    else console.warn(`[${this.prefix}] ${message}`);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (!this.enabled("error")) return;
    if (error && context) console.error(`[${this.prefix}] ${message}`, error, context);
    else if (error) console.error(`[${this.prefix}] ${message}`, error);
    else console.error(`[${this.prefix}] ${message}`);
  }
}

export function createLogger(prefix: string, level: LogLevel = "info"): Logger {
  return new ConsoleLogger(prefix, level);
}
