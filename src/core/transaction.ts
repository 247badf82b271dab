/**
 * One request/response cycle against a worker process.
 *
 * Wire format, newline-delimited UTF-8:
 *   request:  N input lines, then a sentinel line
 *   response: zero or more output lines, then the same sentinel echoed back
 *
 * The response may hold more lines than the request (one obfuscated frame can
 * expand into several inlined frames), so the sentinel is the only reliable end
 * marker. Any failure yields the input unchanged: deobfuscation is best-effort.
 *
 * @module
 */

import { randomBytes } from "node:crypto";
import type { Logger } from "../interfaces/logger.js";

export interface TimeoutPolicy {
  /** Floor for every request; covers process start-up. */
  minimumTimeoutMs: number;
  /** Budget per input line. */
  perLineTimeoutMs: number;
}

export type DegradeReason =
  | "closed"
  | "write-failed"
  | "timeout"
  | "closed-during-wait"
  | "incomplete-output";

export type TransactionResult =
  | { status: "ok"; lines: string[] }
  | { status: "degraded"; reason: DegradeReason; lines: string[] };

/** The slice of a worker that a transaction may touch while holding its lock. */
export interface TransactionTarget {
  readonly pid: number;
  isClosed(): boolean;
  /** True once close() has been called, by anyone. */
  wasClosedExplicitly(): boolean;
  exitCode(): number | null;
  write(payload: string): Promise<void>;
  /** Next output line, or null at end of stream. */
  readLine(): Promise<string | null>;
  close(): Promise<void>;
}

export interface TransactionOptions {
  sentinel: string;
  timeouts: TimeoutPolicy;
  logger: Logger;
}

export const TIMED_OUT = Symbol("timed-out");

export interface Deadline {
  readonly expired: Promise<typeof TIMED_OUT>;
  cancel(): void;
}

type WriteOutcome = { ok: true } | { ok: false; error: unknown };

/** 128 random bits as 32 lowercase hex characters. */
export function createSentinel(): string {
  return randomBytes(16).toString("hex");
}

export function computeTimeoutMs(lineCount: number, policy: TimeoutPolicy): number {
  return Math.max(policy.minimumTimeoutMs, lineCount * policy.perLineTimeoutMs);
}

export function frameRequest(lines: readonly string[], sentinel: string): string {
  return `${lines.join("\n")}\n${sentinel}\n`;
}

export function startDeadline(ms: number): Deadline {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  return {
    expired,
    cancel() {
      if (timer !== undefined) clearTimeout(timer);
    },
  };
}

/**
 * Collect output lines into `into` until the sentinel (true) or end of
 * stream (false). The sentinel itself is not collected.
 */
export async function readResponse(
  target: Pick<TransactionTarget, "readLine">,
  sentinel: string,
  into: string[],
): Promise<boolean> {
  while (true) {
    const line = await target.readLine();
    if (line === null) return false;
    if (line === sentinel) return true;
    into.push(line);
  }
}

function degraded(reason: DegradeReason, lines: readonly string[]): TransactionResult {
  return { status: "degraded", reason, lines: [...lines] };
}

/**
 * Run one transaction. The caller must hold the target's lock and must not
 * pass an empty batch.
 */
export async function runTransaction(
  target: TransactionTarget,
  lines: readonly string[],
  options: TransactionOptions,
): Promise<TransactionResult> {
  const { logger, sentinel } = options;
  const pid = target.pid;

  if (target.isClosed()) {
    if (!target.wasClosedExplicitly()) {
      logger.warn("Worker process exited", { pid, exitCode: target.exitCode() });
      await target.close();
    }
    return degraded("closed", lines);
  }

  const output: string[] = [];
  // Start draining stdout before writing: both pipes have bounded buffers.
  const reading = readResponse(target, sentinel, output).catch((error: unknown) => {
    logger.warn("Reading worker output failed", { pid, error });
    return false;
  });

  const timeoutMs = computeTimeoutMs(lines.length, options.timeouts);
  const deadline = startDeadline(timeoutMs);

  const onTimeout = async (): Promise<TransactionResult> => {
    if (target.wasClosedExplicitly()) {
      logger.warn("Worker closed by another caller while waiting", { pid });
      return degraded("closed-during-wait", lines);
    }
    logger.error("Worker timed out", { pid, timeoutMs, lineCount: lines.length });
    await target.close();
    return degraded("timeout", lines);
  };

  try {
    const writing = target.write(frameRequest(lines, sentinel)).then(
      (): WriteOutcome => ({ ok: true }),
      (error: unknown): WriteOutcome => ({ ok: false, error }),
    );
    const written = await Promise.race([writing, deadline.expired]);
    if (written === TIMED_OUT) return await onTimeout();
    if (!written.ok && target.wasClosedExplicitly()) {
      logger.warn("Worker closed by another caller while waiting", { pid });
      return degraded("closed-during-wait", lines);
    }
    if (!written.ok) {
      logger.error("Failed writing to worker", { pid, error: written.error });
      await target.close();
      return degraded("write-failed", lines);
    }

    const completed = await Promise.race([reading, deadline.expired]);
    if (target.wasClosedExplicitly()) {
      logger.warn("Worker closed by another caller while waiting", { pid });
      return degraded("closed-during-wait", lines);
    }
    if (completed === TIMED_OUT) return await onTimeout();
    if (!completed) {
      logger.warn("Worker output ended before the end marker", {
        pid,
        exitCode: target.exitCode(),
        received: output.length,
      });
      await target.close();
      return degraded("incomplete-output", lines);
    }
    return { status: "ok", lines: output };
  } finally {
    deadline.cancel();
  }
}
