export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type LogContext = Record<string, unknown>;

let threshold: LogLevel = "info";

// stdout carries the MCP stdio transport, so every line goes to stderr.
let sink: (line: string) => void = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Redirects log lines; returns the previous sink. */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const previous = sink;
  sink = next;
  return previous;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export class Logger {
  constructor(private readonly scope: string) {}

  private write(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
      return;
    }
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
    sink(`[${timestamp}] [${level.toUpperCase()}] [${this.scope}] ${message}${contextStr}`);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const suffix = error === undefined ? "" : `: ${describeError(error)}`;
    this.write("error", `${message}${suffix}`, context);
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
