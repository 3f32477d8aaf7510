import { sanitizeUnknown } from "../helpers/error/redaction";

/**
 * Supported log levels ordered from highest severity (`error`) to most verbose (`debug`).
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * Structured representation of a single log line emitted by the {@link Logger}.
 */
export interface LogEvent {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

/**
 * Mutable level cell shared between a logger and its children.
 */
export interface LogLevelState {
  current: LogLevel;
}

export interface Disposable {
  dispose(): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Scoped logger writing structured lines to the process console streams.
 *
 * @remarks
 * Metadata is redacted before serialization, so callers may pass session
 * state or raw responses without leaking cookies or tokens.
 */
export class Logger {
  private static readonly logObservers = new Set<(entry: LogEvent) => void>();

  private readonly levelState: LogLevelState;
  private disposed = false;

  constructor(
    private readonly scope = "EchoRelay",
    level: LogLevel | LogLevelState = "info",
  ) {
    this.levelState = typeof level === "string" ? { current: level } : level;
  }

  /**
   * Subscribes to structured log events emitted by any {@link Logger} instance.
   */
  static onDidLog(listener: (entry: LogEvent) => void): Disposable {
    Logger.logObservers.add(listener);
    return {
      dispose: () => {
        Logger.logObservers.delete(listener);
      },
    };
  }

  /**
   * Creates a logger for a sub-component. The child and this logger share one
   * level: `setLevel` on either applies to both.
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.levelState);
  }

  setLevel(level: LogLevel): void {
    this.levelState.current = level;
  }

  getLevel(): LogLevel {
    return this.levelState.current;
  }

  isEnabled(level: LogLevel): boolean {
    return !this.disposed && LEVEL_ORDER[level] <= LEVEL_ORDER[this.levelState.current];
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  /**
   * Only emitted when the current level is `debug`.
   */
  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  dispose(): void {
    this.disposed = true;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      data: data === undefined ? undefined : sanitizeUnknown(data),
    };
    this.writeToConsole(level, Logger.format(event));
    Logger.emitLogEvent(event);
  }

  /**
   * Formats a {@link LogEvent} into a single line, including serialized
   * metadata when available.
   */
  static format(ev: LogEvent): string {
    const base = `[${ev.timestamp}] [${ev.level.toUpperCase()}] [${ev.scope}] ${ev.message}`;
    if (ev.data !== undefined) {
      try {
        return `${base} :: ${JSON.stringify(ev.data)}`;
      } catch (err) {
        return `${base} [WARN: Failed to serialize data: ${err instanceof Error ? err.message : String(err)}]`;
      }
    }
    return base;
  }

  private writeToConsole(level: LogLevel, line: string): void {
    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.debug(line);
        break;
    }
  }

  private static emitLogEvent(event: LogEvent): void {
    if (Logger.logObservers.size === 0) {
      return;
    }
    for (const listener of Array.from(Logger.logObservers)) {
      try {
        listener(event);
      } catch (error) {
        console.warn("Logger observer threw an error and will be ignored", error);
      }
    }
  }
}
