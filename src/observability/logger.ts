/**
 * Structured logging to stderr.
 * One JSON object per line so a host process can forward or parse it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = value?.toLowerCase();
  return LEVELS.find((level) => level === v) ?? "info";
}

export class Logger {
  #minLevel: LogLevel;
  #enabled = true;
  #sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  /** Logs a failed operation with the error's stable code when it has one. */
  failure(event: string, err: unknown, data?: Record<string, unknown>): void {
    const code = err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : "UNKNOWN";
    this.error(event, {
      ...data,
      err_code: code,
      err_message: err instanceof Error ? err.message : String(err),
    });
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

// Shared logger instance
export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
