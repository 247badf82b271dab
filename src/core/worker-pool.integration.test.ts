import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../interfaces/logger.js";
import type { PoolConfig } from "../types/config.js";
import type { WorkerPoolEventMap } from "./worker-pool.js";
import { WorkerPool } from "./worker-pool.js";

/**
 * Runs real `node` child processes. The fixture worker rewrites obfuscated
 * class names found in sample.mapping and passes every other line through.
 */

const FIXTURES = new URL("../testing/fixtures/", import.meta.url);
const WORKER_SCRIPT = fileURLToPath(new URL("mapping-worker.mjs", FIXTURES));
const MAPPING = fileURLToPath(new URL("sample.mapping", FIXTURES));

const OBFUSCATED = [
  "java.lang.IllegalStateException: request failed",
  "\tat a.b$a.run(Unknown Source:4)",
  "\tat a.b.b(SourceFile:88)",
  "\tat a.a.a(SourceFile:12)",
  "",
  "Caused by: java.io.IOException: timeout",
];

const DEOBFUSCATED = [
  "java.lang.IllegalStateException: request failed",
  "\tat com.example.app.net.HttpClient$Callback.run(Unknown Source:4)",
  "\tat com.example.app.net.HttpClient.b(SourceFile:88)",
  "\tat com.example.app.MainActivity.a(SourceFile:12)",
  "",
  "Caused by: java.io.IOException: timeout",
];

/** Signal 0 checks the pid without delivering anything. */
function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("WorkerPool with node worker processes", () => {
  const pools: WorkerPool[] = [];

  afterEach(async () => {
    await Promise.all(pools.splice(0).map((pool) => pool.close()));
  });

  function createPool(config: Partial<PoolConfig> = {}, logger: Logger = createLogger()): WorkerPool {
    const pool = new WorkerPool({
      config: {
        workerCommand: process.execPath,
        workerArgs: [WORKER_SCRIPT],
        mappingPath: MAPPING,
        poolSize: 2,
        ...config,
      },
      logger,
    });
    pools.push(pool);
    return pool;
  }

  it("deobfuscates a stack trace", async () => {
    const pool = createPool();
    await expect(pool.transform(OBFUSCATED)).resolves.toEqual(DEOBFUSCATED);
  });

  it("keeps concurrent batches apart", async () => {
    const pool = createPool();
    const batches = Array.from({ length: 8 }, (_, i) =>
      Array.from({ length: 50 }, (_, j) => `batch ${i} line ${j} at a.a.a(SourceFile:${j})`),
    );

    const results = await Promise.all(batches.map((batch) => pool.transform(batch)));

    results.forEach((result, i) => {
      expect(result).toHaveLength(50);
      expect(result[0]).toBe(`batch ${i} line 0 at com.example.app.MainActivity.a(SourceFile:0)`);
      expect(result[49]).toBe(`batch ${i} line 49 at com.example.app.MainActivity.a(SourceFile:49)`);
    });
    expect(pool.stats().degraded).toBe(0);
  });

  it("logs what workers write to stderr", async () => {
    const logger = createLogger();
    const pool = createPool({ poolSize: 1 }, logger);

    await pool.transform(["a.a"]);

    await vi.waitFor(() =>
      expect(logger.debug).toHaveBeenCalledWith("Worker stderr", {
        pid: pool.pids[0],
        line: "loaded 3 classes",
      }),
    );
  });

  it("returns the input when workers keep crashing", async () => {
    const pool = createPool({ poolSize: 1, workerArgs: ["-e", "process.exit(3)"] });

    await expect(pool.transform(OBFUSCATED)).resolves.toEqual(OBFUSCATED);
    await expect(pool.transform(["a.a"])).resolves.toEqual(["a.a"]);
    expect(pool.stats().degraded).toBe(2);
  });

  it("times out a worker that never answers", async () => {
    const pool = createPool({
      poolSize: 1,
      workerArgs: ["-e", "setInterval(() => {}, 1000)"],
      minimumTimeoutMs: 200,
    });
    const degraded: WorkerPoolEventMap["transform:degraded"][] = [];
    pool.on("transform:degraded", (event) => degraded.push(event));
    const [pid] = pool.pids;

    const started = Date.now();
    await expect(pool.transform(["a.a"])).resolves.toEqual(["a.a"]);

    expect(Date.now() - started).toBeLessThan(3000);
    expect(degraded).toEqual([{ pid, reason: "timeout", lineCount: 1 }]);
    expect(isRunning(pid)).toBe(false);
  });

  it("terminates every worker on close", async () => {
    const pool = createPool({ poolSize: 3 });
    const pids = pool.pids;
    await pool.transform(["a.a"]);

    await pool.close();

    expect(pids.map(isRunning)).toEqual([false, false, false]);
  });
});
