/**
 * Structured, level-filtered logging.
 *
 * Lines go to stderr so stdout stays reserved for command output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: string;
}

export type LogSink = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function formatContext(context: LogContext | undefined): string {
  if (!context) {
    return "";
  }
  const parts = Object.entries(context).map(
    ([key, value]) =>
      `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`,
  );
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export const stderrSink: LogSink = (entry) => {
  const errorPart = entry.error ? ` error="${entry.error}"` : "";
  process.stderr.write(
    `${entry.timestamp} ${entry.level.toUpperCase()} [${entry.scope}] ${entry.message}${formatContext(entry.context)}${errorPart}\n`,
  );
};

class ScopedLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly minLevel: LogLevel,
    private readonly sink: LogSink,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log("error", message, context, error);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`, this.minLevel, this.sink);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {
      return;
    }

    this.sink({
      level,
      scope: this.scope,
      message,
      timestamp: new Date().toISOString(),
      context,
      error:
        error === undefined
          ? undefined
          : error instanceof Error
            ? error.message
            : String(error),
    });
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(scope = "vigil", options: LoggerOptions = {}): Logger {
  return new ScopedLogger(
    scope,
    options.level ?? parseLogLevel(process.env["VIGIL_LOG_LEVEL"]),
    options.sink ?? stderrSink,
  );
}
