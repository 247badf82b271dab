import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";
import { LineBuffer } from "../utils/line-buffer.js";

/** Matches the default sentinel format: 128 bits as lowercase hex. */
export const DEFAULT_SENTINEL_PATTERN = /^[0-9a-f]{32}$/;

/** Script-facing view of a fake worker. Behaviors drive it from inside. */
export interface FakeWorker {
  readonly pid: number;
  readonly args: string[];
  /** Every line received on stdin, sentinels included. */
  readonly received: string[];
  readonly killCalls: string[];
  readonly hasExited: boolean;
  onLine(listener: (line: string) => void): void;
  emitLine(line: string): void;
  emitStderr(line: string): void;
  exit(code: number | null): void;
  /** Make every following stdin write reject. */
  failWrites(error?: Error): void;
}

export type FakeWorkerBehavior = (worker: FakeWorker) => void;

const encoder = new TextEncoder();

/** An in-process stand-in for a worker process, driven by a behavior. */
export class FakeWorkerProcess implements ProcessHandle, FakeWorker {
  readonly pid: number;
  readonly args: string[];
  readonly exited: Promise<number | null>;
  readonly stdin: WritableStream<Uint8Array>;
  readonly stdout: ReadableStream<Uint8Array>;
  readonly stderr: ReadableStream<Uint8Array>;
  readonly received: string[] = [];
  readonly killCalls: string[] = [];

  private readonly listeners: Array<(line: string) => void> = [];
  private readonly input = new LineBuffer();
  private resolveExit: (code: number | null) => void = () => {};
  private pushStdout: (chunk: Uint8Array) => void = () => {};
  private endStdout: () => void = () => {};
  private pushStderr: (chunk: Uint8Array) => void = () => {};
  private endStderr: () => void = () => {};
  private writeError: Error | null = null;
  private exitedFlag = false;
  private code: number | null = null;

  constructor(pid: number, args: string[]) {
    this.pid = pid;
    this.args = args;
    this.exited = new Promise<number | null>((resolve) => {
      this.resolveExit = resolve;
    });
    this.stdout = new ReadableStream<Uint8Array>({
      start: (controller) => {
        this.pushStdout = (chunk) => controller.enqueue(chunk);
        this.endStdout = () => controller.close();
      },
      cancel: () => {
        this.pushStdout = () => {};
        this.endStdout = () => {};
      },
    });
    this.stderr = new ReadableStream<Uint8Array>({
      start: (controller) => {
        this.pushStderr = (chunk) => controller.enqueue(chunk);
        this.endStderr = () => controller.close();
      },
      cancel: () => {
        this.pushStderr = () => {};
        this.endStderr = () => {};
      },
    });
    this.stdin = new WritableStream<Uint8Array>({
      write: (chunk) => {
        if (this.writeError) throw this.writeError;
        if (this.exitedFlag) throw new Error("EPIPE: worker has exited");
        for (const line of this.input.feed(chunk)) {
          this.received.push(line);
          for (const listener of this.listeners) listener(line);
        }
      },
    });
  }

  get hasExited(): boolean {
    return this.exitedFlag;
  }

  get exitCode(): number | null {
    return this.code;
  }

  kill(signal: "SIGTERM" | "SIGKILL" | "SIGINT" = "SIGTERM"): void {
    this.killCalls.push(signal);
    this.exit(null);
  }

  onLine(listener: (line: string) => void): void {
    this.listeners.push(listener);
  }

  emitLine(line: string): void {
    if (this.exitedFlag) return;
    this.pushStdout(encoder.encode(`${line}\n`));
  }

  emitStderr(line: string): void {
    if (this.exitedFlag) return;
    this.pushStderr(encoder.encode(`${line}\n`));
  }

  exit(code: number | null): void {
    if (this.exitedFlag) return;
    this.exitedFlag = true;
    this.code = code;
    this.endStdout();
    this.endStderr();
    this.resolveExit(code);
  }

  failWrites(error: Error = new Error("EPIPE: broken pipe")): void {
    this.writeError = error;
  }
}

/**
 * Mock ProcessManager for testing.
 * Every spawn creates a FakeWorkerProcess and hands it to the current behavior.
 */
export class MockProcessManager implements ProcessManager {
  readonly spawnCalls: SpawnOptions[] = [];
  readonly spawnedProcesses: FakeWorkerProcess[] = [];
  private behavior: FakeWorkerBehavior;
  private nextPid = 10000;
  private shouldFailSpawn = false;

  constructor(behavior: FakeWorkerBehavior = echoWorker()) {
    this.behavior = behavior;
  }

  spawn(options: SpawnOptions): ProcessHandle {
    this.spawnCalls.push(options);

    if (this.shouldFailSpawn) {
      throw new Error("Mock spawn failure");
    }

    const worker = new FakeWorkerProcess(this.nextPid++, options.args);
    this.spawnedProcesses.push(worker);
    this.behavior(worker);
    return worker;
  }

  /** Behavior for workers spawned from now on. */
  setBehavior(behavior: FakeWorkerBehavior): void {
    this.behavior = behavior;
  }

  /** Make every following spawn() call throw until reset. */
  failSpawns(): void {
    this.shouldFailSpawn = true;
  }

  resetSpawnFailure(): void {
    this.shouldFailSpawn = false;
  }

  get lastProcess(): FakeWorkerProcess | undefined {
    return this.spawnedProcesses[this.spawnedProcesses.length - 1];
  }

  /** Lines each worker has received, keyed by pid. */
  receivedByPid(): Map<number, string[]> {
    return new Map(this.spawnedProcesses.map((worker) => [worker.pid, [...worker.received]]));
  }
}

// ─── Behaviors ────────────────────────────────────────────────────────────────

export interface MappingWorkerOptions {
  /** Delay before each response line, in ms. Responses stay in order. */
  delayMs?: number;
  isSentinel?: (line: string) => boolean;
}

function defaultIsSentinel(line: string): boolean {
  return DEFAULT_SENTINEL_PATTERN.test(line);
}

/** Maps each input line to zero or more output lines and echoes sentinels. */
export function mappingWorker(
  map: (line: string) => string[],
  options: MappingWorkerOptions = {},
): FakeWorkerBehavior {
  const isSentinel = options.isSentinel ?? defaultIsSentinel;
  return (worker) => {
    let queue = Promise.resolve();
    worker.onLine((line) => {
      const out = isSentinel(line) ? [line] : map(line);
      if (!options.delayMs) {
        for (const item of out) worker.emitLine(item);
        return;
      }
      const delayMs = options.delayMs;
      queue = queue.then(
        () =>
          new Promise<void>((resolve) => {
            setTimeout(() => {
              for (const item of out) worker.emitLine(item);
              resolve();
            }, delayMs);
          }),
      );
    });
  };
}

/** Echoes every line verbatim. */
export function echoWorker(options: MappingWorkerOptions = {}): FakeWorkerBehavior {
  return mappingWorker((line) => [line], options);
}

/**
 * Prefixes each output line with the index of the request it belongs to,
 * counting sentinels, so interleaved requests show up as mixed tags.
 */
export function taggingWorker(options: MappingWorkerOptions = {}): FakeWorkerBehavior {
  const isSentinel = options.isSentinel ?? defaultIsSentinel;
  return (worker) => {
    let requestIndex = 0;
    mappingWorker((line) => [`${requestIndex}:${line}`], options)(worker);
    worker.onLine((line) => {
      if (isSentinel(line)) requestIndex++;
    });
  };
}

/** Reads input but never answers. */
export function silentWorker(): FakeWorkerBehavior {
  return () => {};
}

/** Exits without answering as soon as any input arrives. */
export function crashOnInputWorker(code = 1): FakeWorkerBehavior {
  return (worker) => {
    worker.onLine(() => worker.exit(code));
  };
}

/** Exits before it can take a request. */
export function exitOnSpawnWorker(code = 1): FakeWorkerBehavior {
  return (worker) => worker.exit(code);
}

/** Alive, but every stdin write fails. */
export function brokenPipeWorker(error?: Error): FakeWorkerBehavior {
  return (worker) => worker.failWrites(error);
}
