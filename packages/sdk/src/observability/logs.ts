/**
 * Structured logging for client operations
 *
 * Lines go to stderr so stdout stays clean for command output.
 * Callers must never pass credential values in any field.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  method?: string;
  url?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (line: string, level: LogLevel) => void;

const defaultSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export class Logger {
  #enabled = true;
  #sink: LogSink;

  constructor(sink: LogSink = defaultSink) {
    this.#sink = sink;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    // Debug output is opt-in
    if (level === "debug" && !process.env.SNIPSTASH_DEBUG) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.method || entry.url) {
      parts.push(`${entry.method ?? ""} ${entry.url ?? ""}`.trim());
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(parts.join(" "), level);
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
