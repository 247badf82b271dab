import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields added to every record. Per-call context wins on conflict. */
  bindings?: Record<string, unknown>;
  /** Cut string values longer than this, e.g. a runaway worker stderr line. */
  maxStringLength?: number;
  now?: () => Date;
}

export interface RecordFormat {
  component?: string;
  bindings?: Record<string, unknown>;
  maxStringLength?: number;
}

function clip(value: string, max: number | undefined): string {
  if (max === undefined || value.length <= max) return value;
  return `${value.slice(0, max)}…[${value.length - max} more]`;
}

/** Build one JSON log line. Falls back to the envelope alone when ctx cannot be serialized. */
export function formatRecord(
  time: Date,
  level: LogLevel,
  msg: string,
  ctx: Record<string, unknown> | undefined,
  format: RecordFormat = {},
): string {
  const max = format.maxStringLength;
  const entry: Record<string, unknown> = {
    time: time.toISOString(),
    level: LEVEL_NAMES[level],
    msg,
  };
  if (format.component) entry.component = format.component;

  const fields = { ...format.bindings, ...ctx };
  for (const [key, value] of Object.entries(fields)) {
    if (RESERVED_FIELDS.has(key)) continue;
    if (value instanceof Error) {
      entry[key] = clip(value.message, max);
      entry[`${key}Stack`] = value.stack;
      if (value.cause instanceof Error) entry[`${key}Cause`] = clip(value.cause.message, max);
      if ("code" in value && typeof value.code === "string") entry[`${key}Code`] = value.code;
    } else if (typeof value === "string") {
      entry[key] = clip(value, max);
    } else {
      entry[key] = value;
    }
  }

  try {
    return JSON.stringify(entry);
  } catch {
    return JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true });
  }
}

/** One JSON object per line, written to stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly now: () => Date;
  private readonly format: RecordFormat;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.now = options.now ?? (() => new Date());
    this.format = {
      component: options.component,
      bindings: options.bindings,
      maxStringLength: options.maxStringLength,
    };
  }

  /** Same writer and level, with `bindings` merged over this logger's own. */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      now: this.now,
      component: this.format.component,
      maxStringLength: this.format.maxStringLength,
      bindings: { ...this.format.bindings, ...bindings },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    this.writer(formatRecord(this.now(), level, msg, ctx, this.format));
  }
}
