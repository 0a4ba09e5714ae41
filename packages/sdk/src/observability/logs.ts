/**
 * Console logger for engine events
 *
 * Lines read `[<iso time>] [<LEVEL>] [<event>] <model>#<id> <message> <details json>`.
 * Debug lines are printed only while MODELKV_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  model?: string;
  id?: number;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function debugEnabled(): boolean {
  return Boolean(process.env.MODELKV_DEBUG);
}

/**
 * Render one entry as a single console line
 */
export function formatEntry(entry: LogEntry): string {
  const subject =
    entry.model === undefined ? undefined : entry.id === undefined ? entry.model : `${entry.model}#${entry.id}`;

  return [
    `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`,
    subject,
    entry.message,
    entry.details && JSON.stringify(entry.details),
  ]
    .filter((part): part is string => typeof part === "string" && part.length > 0)
    .join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !debugEnabled()) return;

    WRITERS[level](formatEntry({ ...fields, timestamp: new Date().toISOString(), level, event }));
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
