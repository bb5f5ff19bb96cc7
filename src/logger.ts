import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Every {@link LogLevel}, from the most to the least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal sink the logger writes JSON lines to. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Destination of the JSON lines. Defaults to `process.stdout`. */
  readonly stream?: LogStream;
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on a stream and optionally mirrors
 * them to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  readonly level: LogLevel;
  private readonly stream: LogStream;
  private readonly logFile?: string;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /**
   * Tracks whether the directory containing {@link logFile} has already been
   * created so `mkdir` runs once rather than for every entry.
   */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.stream = options.stream ?? process.stdout;
    if (options.logFile) {
      this.logFile = options.logFile;
    }
    if (options.onEntry) {
      this.entryListener = options.onEntry;
    }
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow future attempts to retry directory creation after a failure.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}
