import { spawn as nodeSpawn } from "node:child_process";
import { Readable, Writable } from "node:stream";
import { ProcessError } from "../errors.js";
import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";

/**
 * Node.js process manager using child_process.spawn.
 * All three stdio pipes are exposed as web streams via toWeb().
 */
export class NodeProcessManager implements ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle {
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : undefined,
      stdio: ["pipe", "pipe", "pipe"],
    });

    // Attach an early error listener immediately after spawn() so ENOENT-style
    // failures cannot surface as unhandled exceptions before we build the handle.
    const earlyErrorListener = () => {};
    child.on("error", earlyErrorListener);

    if (typeof child.pid !== "number") {
      throw new ProcessError(`Failed to spawn process: ${options.command}`);
    }

    const pid = child.pid;
    let hasExited = false;
    let exitCode: number | null = null;

    // EPIPE after the worker dies is reported through the web stream's write()
    // rejection; the listener keeps it from becoming an uncaught 'error' event.
    child.stdin?.on("error", () => {});

    const stdin = child.stdin ? (Writable.toWeb(child.stdin) as WritableStream<Uint8Array>) : null;
    const stdout = child.stdout
      ? (Readable.toWeb(child.stdout) as ReadableStream<Uint8Array>)
      : null;
    const stderr = child.stderr
      ? (Readable.toWeb(child.stderr) as ReadableStream<Uint8Array>)
      : null;

    const exited = new Promise<number | null>((resolve) => {
      child.on("exit", (code, signal) => {
        hasExited = true;
        exitCode = signal ? null : code;
        resolve(exitCode);
      });
      child.on("error", () => {
        hasExited = true;
        resolve(null);
      });
    });

    // Real error handlers are now attached; remove the early no-op listener.
    child.off("error", earlyErrorListener);

    return {
      pid,
      exited,
      get hasExited() {
        return hasExited;
      },
      get exitCode() {
        return exitCode;
      },
      kill(signal: "SIGTERM" | "SIGKILL" | "SIGINT" = "SIGTERM") {
        try {
          child.kill(signal);
        } catch {
          // Process may already be dead
        }
      },
      stdin,
      stdout,
      stderr,
    };
  }
}
