// =============================================================================
// ConsoleLoggingAdapter — LoggerPort writing timestamped lines to the console
// =============================================================================

import type { LogEntry, LogLevel, LoggerPort } from "../../ports/logging.port.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggingOptions {
  /** Logger name shown in every line (default: "spendguard") */
  scope?: string;
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
  /** Custom sink (defaults to console.log / console.error by level) */
  sink?: (entry: LogEntry) => void;
}

export function formatLogEntry(entry: LogEntry): string {
  return `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] [${entry.scope}] ${entry.event}`;
}

function defaultSink(entry: LogEntry): void {
  const line = formatLogEntry(entry);
  const write = entry.level === "error" || entry.level === "warn" ? console.error : console.log;
  if (entry.data) {
    write(line, entry.data);
  } else {
    write(line);
  }
}

export class ConsoleLoggingAdapter implements LoggerPort {
  private readonly scope: string;
  private readonly level: LogLevel;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: ConsoleLoggingOptions = {}) {
    this.scope = options.scope ?? "spendguard";
    this.level = options.level ?? "info";
    this.sink = options.sink ?? defaultSink;
  }

  /** A logger sharing this one's level and sink under another scope */
  child(scope: string): ConsoleLoggingAdapter {
    return new ConsoleLoggingAdapter({ scope, level: this.level, sink: this.sink });
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.emit("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.emit("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.emit("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.emit("error", event, data);
  }

  private emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    this.sink({ timestamp: Date.now(), level, scope: this.scope, event, data });
  }
}
