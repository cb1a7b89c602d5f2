/**
 * Structured logging for store and table operations
 *
 * Lines go to stderr so they never mix with command output. Debug lines are
 * only written when ORDTAB_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  collection?: string;
  table?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  #enabled = true;
  #level: LogLevel = "warn";

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug") {
      if (!process.env.ORDTAB_DEBUG) return;
    } else if (LEVEL_RANK[level] < LEVEL_RANK[this.#level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.table || entry.collection) {
      parts.push(`${entry.table ?? ""}/${entry.collection ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    const line = parts.join(" ");
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
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

  /**
   * Lowest level written for non-debug events (default: warn)
   */
  setLevel(level: LogLevel): void {
    this.#level = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
