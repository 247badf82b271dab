import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { PoolClosedError, toDeobfuscationError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessManager } from "../interfaces/process-manager.js";
import { type PoolConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { Mutex } from "./mutex.js";
import type { DegradeReason } from "./transaction.js";
import { TypedEventEmitter } from "./typed-emitter.js";
import { WorkerHandle } from "./worker-handle.js";

export interface WorkerPoolEventMap {
  "worker:spawned": { pid: number };
  "worker:restarted": { previousPid: number; pid: number };
  "transform:degraded": { pid: number; reason: DegradeReason; lineCount: number };
  error: { source: string; error: Error };
}

export interface WorkerPoolOptions {
  config: PoolConfig;
  /** Defaults to NodeProcessManager. */
  processManager?: ProcessManager;
  logger?: Logger;
  createSentinel?: () => string;
}

export interface WorkerPoolStats {
  size: number;
  ready: number;
  busy: number;
  closed: number;
  restarts: number;
  transactions: number;
  degraded: number;
}

/**
 * A fixed number of worker processes behind one transform() entry point.
 *
 * Selection prefers an idle, live worker and rotates the chosen one to the
 * back. Dead workers are replaced lazily, at the next selection, rather than
 * by a background supervisor: a crash is noticed on next use.
 *
 * Selection is serialized; the transactions it hands out are not, so a slow
 * worker only holds up callers queued on that same worker.
 */
export class WorkerPool extends TypedEventEmitter<WorkerPoolEventMap> {
  private handles: WorkerHandle[];
  private readonly selectionLock = new Mutex();
  private readonly config: ResolvedConfig;
  private readonly processManager: ProcessManager;
  private readonly logger: Logger;
  private readonly createSentinel: (() => string) | undefined;
  private closed = false;
  private restarts = 0;
  private transactions = 0;
  private degraded = 0;

  /**
   * Spawns every worker up front.
   * @throws ConfigError for invalid configuration, ProcessError when a worker cannot start.
   */
  constructor(options: WorkerPoolOptions) {
    super();
    this.config = resolveConfig(options.config);
    this.processManager = options.processManager ?? new NodeProcessManager();
    this.logger = options.logger ?? noopLogger;
    this.createSentinel = options.createSentinel;

    const handles: WorkerHandle[] = [];
    try {
      for (let i = 0; i < this.config.poolSize; i++) {
        handles.push(this.spawnHandle());
      }
    } catch (err) {
      for (const handle of handles) void handle.close();
      throw err;
    }
    this.handles = handles;
    this.logger.info("Worker pool started", {
      poolSize: this.config.poolSize,
      command: this.config.workerCommand,
      mappingPath: this.config.mappingPath,
    });
  }

  /** Configured number of workers, or 0 once closed. */
  get size(): number {
    return this.handles.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Pids in selection order: the next preferred worker first. */
  get pids(): number[] {
    return this.handles.map((handle) => handle.pid);
  }

  /**
   * Deobfuscate a batch of lines. Never rejects because of a worker problem;
   * the input comes back unchanged instead.
   * @throws PoolClosedError when called after close().
   */
  async transform(lines: readonly string[]): Promise<string[]> {
    const selected = await this.selectionLock.runExclusive(() => this.select(lines.length));
    if (!selected) return [];

    const result = await selected.execute(lines);
    this.transactions++;
    if (result.status === "degraded") {
      this.degraded++;
      this.emit("transform:degraded", {
        pid: selected.pid,
        reason: result.reason,
        lineCount: lines.length,
      });
    }
    return result.lines;
  }

  /** Close every worker. Idempotent; transform() rejects afterwards. */
  async close(): Promise<void> {
    await this.selectionLock.runExclusive(async () => {
      if (this.closed) return;
      this.closed = true;
      const handles = this.handles;
      this.handles = [];
      await Promise.all(handles.map((handle) => handle.close()));
      this.logger.info("Worker pool closed", { workers: handles.length });
    });
  }

  stats(): WorkerPoolStats {
    let ready = 0;
    let busy = 0;
    let closed = 0;
    for (const handle of this.handles) {
      if (handle.isClosed()) closed++;
      else if (handle.isBusy()) busy++;
      else ready++;
    }
    return {
      size: this.handles.length,
      ready,
      busy,
      closed,
      restarts: this.restarts,
      transactions: this.transactions,
      degraded: this.degraded,
    };
  }

  /** Runs under the selection lock. Null means there is nothing to send. */
  private async select(lineCount: number): Promise<WorkerHandle | null> {
    if (this.closed) throw new PoolClosedError();
    if (lineCount === 0) return null;

    await this.replaceClosedHandles();

    const index = Math.max(
      this.handles.findIndex((handle) => handle.isReady()),
      0,
    );
    const [selected] = this.handles.splice(index, 1);
    this.handles.push(selected);
    return selected;
  }

  private async replaceClosedHandles(): Promise<void> {
    for (let i = 0; i < this.handles.length; i++) {
      const current = this.handles[i];
      if (!current.isClosed()) continue;

      this.logger.warn("Restarting closed worker", {
        pid: current.pid,
        exitCode: current.exitCode,
      });
      // A busy handle may still be draining a response completed before the exit.
      if (current.isBusy()) {
        void current.closeWhenIdle();
      } else {
        await current.close();
      }

      let replacement: WorkerHandle;
      try {
        replacement = this.spawnHandle();
      } catch (err) {
        const error = toDeobfuscationError(err);
        this.logger.error("Failed to restart worker", { pid: current.pid, error });
        this.emit("error", { source: "pool:restart", error });
        continue;
      }

      this.handles[i] = replacement;
      this.restarts++;
      this.emit("worker:restarted", { previousPid: current.pid, pid: replacement.pid });
    }
  }

  private spawnHandle(): WorkerHandle {
    const handle = new WorkerHandle({
      processManager: this.processManager,
      command: this.config.workerCommand,
      args: [...this.config.workerArgs, this.config.mappingPath],
      cwd: this.config.cwd,
      env: this.config.env,
      timeouts: {
        minimumTimeoutMs: this.config.minimumTimeoutMs,
        perLineTimeoutMs: this.config.perLineTimeoutMs,
      },
      logger: this.logger,
      createSentinel: this.createSentinel,
    });
    this.emit("worker:spawned", { pid: handle.pid });
    return handle;
  }
}
