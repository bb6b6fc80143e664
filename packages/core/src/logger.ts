/**
 * Logger - levelled, context-scoped logging.
 *
 * Lines are rendered with `formatWithOptions`, so TandemErrors print through
 * their custom inspector (code, data, cause chain) instead of a bare message.
 */

import util from "node-inspect-extracted";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogSink {
  write(level: Exclude<LogLevel, "silent">, line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  sink?: LogSink;
  colors?: boolean;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LogLevels: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/** Writes every line to stderr so stdout stays free for program output. */
export const stderrSink: LogSink = {
  write(_level, line) {
    process.stderr.write(line + "\n");
  },
};

export class Logger {
  readonly level: LogLevel;
  readonly context: string;
  private readonly sink: LogSink;
  private readonly colors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? "";
    this.sink = options.sink ?? stderrSink;
    this.colors = options.colors ?? false;
  }

  /** A logger that drops everything. */
  static silent(): Logger {
    return new Logger({ level: "silent" });
  }

  /** Same level and sink, nested context ("coordinator:users"). */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      sink: this.sink,
      colors: this.colors,
    });
  }

  enabled(level: Exclude<LogLevel, "silent">): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, data: unknown): void {
    if (!this.enabled(level)) return;
    const prefix = this.context ? `[${level}] (${this.context})` : `[${level}]`;
    const line = data === undefined
      ? util.formatWithOptions({ colors: this.colors }, "%s %s", prefix, message)
      : util.formatWithOptions({ colors: this.colors, depth: 4 }, "%s %s %O", prefix, message, data);
    this.sink.write(level, line);
  }
}
