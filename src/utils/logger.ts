// src/utils/logger.ts
//
// Quill Logger (structured, lightweight)
// --------------------------------------
// Shared by the engine, the module registry, host capability modules and the
// runner. Embedders pass their own instance through EngineOptions; the default
// is silent so that a library user never sees output they did not ask for.
//
// Exported API:
//   - Logger
//   - createLogger(options)
//   - silentLogger()
//   - time(label) -> timer helper
//
// Usage:
//   const log = createLogger({ name: "quill", level: "info" });
//   log.info("module built", { name: "quill.io.fs" });
//   const t = log.time("parse"); ... t.end();
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  /** Bracketed prefix of every line; child loggers append `.suffix`. */
  name?: string;
  level?: LogLevel;
  /** Defaults to the console. */
  sink?: LogSink;
  timestamp?: boolean;
  /** Append the payload as JSON. Default: true */
  includePayload?: boolean;
};

export type Timer = {
  end: (payload?: unknown) => number;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private onceKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "quill";
    this.level = options.level ?? "info";
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;

    this.sink = options.sink ?? {
      error: (msg: string) => console.error(msg),
      warn: (msg: string) => console.warn(msg),
      info: (msg: string) => console.log(msg),
      debug: (msg: string) => console.debug(msg),
    };
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /** A logger sharing this sink and level, with a dotted name suffix. */
  public child(suffix: string): Logger {
    return new Logger({
      name: `${this.name}.${suffix}`,
      level: this.level,
      sink: this.sink,
      timestamp: this.timestamp,
      includePayload: this.includePayload,
    });
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  public logOnce(level: Exclude<LogLevel, "silent">, key: string, msg: string, payload?: unknown): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.emit(level, msg, payload);
  }

  public time(label: string): Timer {
    const start = nowMs();
    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = nowMs() - start;
        this.debug(`${label} took ${ms.toFixed(2)}ms`, payload);
        return ms;
      },
    };
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) return;
    this.sink[level === "trace" ? "debug" : level](this.formatLine(level, msg, payload));
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const head = `[${this.name}] ${level.toUpperCase()}: ${msg}`;
    const line = payload === undefined || !this.includePayload ? head : `${head} ${safeStringify(payload)}`;
    return this.timestamp ? `${isoTime()} ${line}` : line;
  }
}

/* =========================================================
   Factory
   ========================================================= */

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export function silentLogger(): Logger {
  return new Logger({ level: "silent" });
}

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    if (typeof value === "string") return JSON.stringify(value);
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
  } catch {
    try {
      return String(value);
    } catch {
      return "[unserializable]";
    }
  }
}

function nowMs(): number {
  return performance.now();
}

function isoTime(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
