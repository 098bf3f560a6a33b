import type { LogLevel } from "./config";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Prefixed to every message as `[scope]`. */
  scope?: string;
  sink?: LogSink;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(level: LogLevel = "info", options: LoggerOptions = {}) {
    this.minLevel = level;
    this.scope = options.scope;
    this.sink = options.sink ?? consoleSink;
  }

  child(scope: string): Logger {
    return new Logger(this.minLevel, {
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) {
      return;
    }
    const text = this.scope ? `[${this.scope}] ${message}` : message;
    this.sink(level, meta ? `${text} ${JSON.stringify(meta)}` : text);
  }
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}
