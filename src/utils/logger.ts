export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes every level to stderr. stdout is reserved for the MCP stdio
 * transport, so nothing here may print to it.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(options: { level?: LogLevel } = {}) {
    this.minLevel = options.level ?? "info";
  }

  debug(message: string, context?: object): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: object): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: object): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: object): void {
    this.write("error", message, context);
  }

  private write(level: LogLevel, message: string, context?: object): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const line = `[${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  }
}

export class NullLogger implements Logger {
  debug(): void {}

  info(): void {}

  warn(): void {}

  error(): void {}
}
