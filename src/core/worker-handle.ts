import { ProcessError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessHandle, ProcessManager } from "../interfaces/process-manager.js";
import { StreamLineReader } from "../utils/line-buffer.js";
import { noopLogger } from "../utils/noop-logger.js";
import { Mutex } from "./mutex.js";
import {
  createSentinel,
  runTransaction,
  type TimeoutPolicy,
  type TransactionResult,
  type TransactionTarget,
} from "./transaction.js";

export interface WorkerHandleOptions {
  processManager: ProcessManager;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeouts: TimeoutPolicy;
  logger?: Logger;
  /** Sentinel source; tests inject a deterministic one. */
  createSentinel?: () => string;
}

/** Shared between a handle and the leak registry; must not reference the handle. */
export interface Lifecycle {
  readonly pid: number;
  readonly logger: Logger;
  closeCalled: boolean;
}

/** Finalizer for handles collected without close(). Exported for tests. */
export function reportLeakedHandle(lifecycle: Lifecycle): void {
  if (!lifecycle.closeCalled) {
    lifecycle.logger.error("WorkerHandle garbage-collected without close()", {
      pid: lifecycle.pid,
    });
  }
}

/**
 * Best effort: the warning depends on the garbage collector ever running and
 * may never fire. Nothing started by a handle may reference the handle itself
 * (see drainStderr), or a leaked handle would stay reachable.
 */
const leakRegistry = new FinalizationRegistry<Lifecycle>(reportLeakedHandle);

/** Forward worker stderr to the debug log until the stream ends. */
async function drainStderr(reader: StreamLineReader, pid: number, logger: Logger): Promise<void> {
  while (true) {
    const line = await reader.readLine();
    if (line === null) return;
    logger.debug?.("Worker stderr", { pid, line });
  }
}

/**
 * Owns one worker process and runs transactions against it, one at a time.
 *
 * The process is spawned in the constructor so start-up overlaps with
 * whatever the caller does before its first request. A closed handle is
 * never revived; the pool replaces it.
 */
export class WorkerHandle {
  private readonly process: ProcessHandle;
  private readonly output: StreamLineReader | null;
  private readonly diagnostics: StreamLineReader | null;
  private readonly lock = new Mutex();
  private readonly logger: Logger;
  private readonly timeouts: TimeoutPolicy;
  private readonly nextSentinel: () => string;
  private readonly lifecycle: Lifecycle;
  private readonly encoder = new TextEncoder();
  private closing: Promise<void> | null = null;

  /** @throws ProcessError when the process cannot be spawned. */
  constructor(options: WorkerHandleOptions) {
    this.logger = options.logger ?? noopLogger;
    this.timeouts = options.timeouts;
    this.nextSentinel = options.createSentinel ?? createSentinel;

    this.process = options.processManager.spawn({
      command: options.command,
      args: options.args,
      cwd: options.cwd,
      env: options.env,
    });
    this.output = this.process.stdout ? new StreamLineReader(this.process.stdout) : null;
    this.diagnostics = this.process.stderr ? new StreamLineReader(this.process.stderr) : null;

    this.lifecycle = { pid: this.process.pid, logger: this.logger, closeCalled: false };
    leakRegistry.register(this, this.lifecycle, this);

    this.logger.debug?.("Spawned worker", { pid: this.pid, command: options.command });
    if (this.diagnostics) void drainStderr(this.diagnostics, this.pid, this.logger);
  }

  get pid(): number {
    return this.process.pid;
  }

  /** Exit code once the process has exited on its own; null otherwise. */
  get exitCode(): number | null {
    return this.process.exitCode;
  }

  /** Explicitly closed, or the process has exited. */
  isClosed(): boolean {
    return this.lifecycle.closeCalled || this.process.hasExited;
  }

  /** A transaction holds this handle's lock. */
  isBusy(): boolean {
    return this.lock.locked;
  }

  isReady(): boolean {
    return !this.isClosed() && !this.isBusy();
  }

  /**
   * Deobfuscate a batch of lines (no trailing newlines).
   * Returns the input unchanged if anything goes wrong.
   */
  async transform(lines: readonly string[]): Promise<string[]> {
    const result = await this.execute(lines);
    return result.lines;
  }

  /** Like transform(), but reports why a batch came back unchanged. */
  async execute(lines: readonly string[]): Promise<TransactionResult> {
    if (lines.length === 0) return { status: "ok", lines: [] };

    const sentinel = this.nextSentinel();
    if (this.isBusy()) {
      this.logger.warn("Waiting for busy worker", { pid: this.pid, queued: this.lock.waiting + 1 });
    }

    return this.lock.runExclusive(() =>
      runTransaction(this.transactionTarget(), lines, {
        sentinel,
        timeouts: this.timeouts,
        logger: this.logger,
      }),
    );
  }

  /** close() once the transaction holding the lock, if any, has finished. */
  closeWhenIdle(): Promise<void> {
    return this.lock.runExclusive(() => this.close());
  }

  /**
   * Terminate the worker. Idempotent, and safe while a transaction is in
   * flight: that transaction sees the closed state and returns its input.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.lifecycle.closeCalled = true;
    leakRegistry.unregister(this);

    await Promise.all([this.output?.cancel(), this.diagnostics?.cancel()]);
    if (this.process.hasExited) return;

    // A transaction mid-write holds the writer; the kill ends that write.
    const stdin = this.process.stdin;
    if (stdin && !stdin.locked) {
      void stdin.close().catch((error: unknown) => {
        this.logger.debug?.("Worker stdin did not close cleanly", { pid: this.pid, error });
      });
    }

    this.process.kill("SIGKILL");
    const exitCode = await this.process.exited;
    this.logger.debug?.("Worker closed", { pid: this.pid, exitCode });
  }

  private transactionTarget(): TransactionTarget {
    return {
      pid: this.pid,
      isClosed: () => this.isClosed(),
      wasClosedExplicitly: () => this.lifecycle.closeCalled,
      exitCode: () => this.process.exitCode,
      write: (payload) => this.writeInput(payload),
      readLine: () => (this.output ? this.output.readLine() : Promise.resolve(null)),
      close: () => this.close(),
    };
  }

  private async writeInput(payload: string): Promise<void> {
    const stdin = this.process.stdin;
    if (!stdin) {
      throw new ProcessError(`Worker ${this.pid} has no input stream`);
    }
    const writer = stdin.getWriter();
    try {
      await writer.write(this.encoder.encode(payload));
    } finally {
      writer.releaseLock();
    }
  }
}
