/**
 * Human-readable Logger for interactive use.
 * Renders `[prefix] LEVEL message key=value ...` through the console.
 */

import type { Logger } from "../interfaces/logger.js";
import { LEVEL_NAMES, LogLevel } from "./structured-logger.js";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

const METHODS: Record<LogLevel, ConsoleMethod> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "log",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: LogLevel;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") return /\s|"/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Render a context record as space-separated key=value pairs. */
export function formatContext(ctx: Record<string, unknown>): string {
  return Object.entries(ctx)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "deobfuscate";
    this.level = options.level ?? LogLevel.INFO;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;
    const head = `[${this.prefix}] ${LEVEL_NAMES[level].toUpperCase()} ${msg}`;
    const tail = ctx && Object.keys(ctx).length > 0 ? ` ${formatContext(ctx)}` : "";
    console[METHODS[level]](head + tail);
  }
}
