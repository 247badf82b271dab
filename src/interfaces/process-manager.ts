/** A handle to a spawned process with piped stdio exposed as web streams. */
export interface ProcessHandle {
  readonly pid: number;
  /** Resolves when process exits. Null exit code means killed by signal. */
  readonly exited: Promise<number | null>;
  /** Non-blocking exit check; true once the exit has been observed. */
  readonly hasExited: boolean;
  /** Exit code once exited; null while running or when killed by signal. */
  readonly exitCode: number | null;
  kill(signal?: "SIGTERM" | "SIGKILL" | "SIGINT"): void;
  readonly stdin: WritableStream<Uint8Array> | null;
  readonly stdout: ReadableStream<Uint8Array> | null;
  readonly stderr: ReadableStream<Uint8Array> | null;
}

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export interface ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle;
}
