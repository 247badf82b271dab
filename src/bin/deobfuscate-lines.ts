#!/usr/bin/env node
import { createInterface } from "node:readline";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { WorkerPool } from "../core/worker-pool.js";
import { ConfigError, errorMessage } from "../errors.js";
import { type CliConfig, HELP_TEXT, parseArgs } from "./cli-args.js";

const MAX_LOGGED_STRING = 2000;

function writeLines(lines: readonly string[]): Promise<void> {
  if (lines.length === 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    process.stdout.write(`${lines.join("\n")}\n`, (err) => (err ? reject(err) : resolve()));
  });
}

// ── Main ───────────────────────────────────────────────────────────────────

async function run(config: CliConfig): Promise<void> {
  const logger = new StructuredLogger({
    component: "deobfuscate-lines",
    level: config.verbose ? LogLevel.DEBUG : LogLevel.WARN,
    maxStringLength: MAX_LOGGED_STRING,
  });
  const pool = new WorkerPool({
    config: config.pool,
    logger: logger.child({ mappingPath: config.pool.mappingPath }),
  });
  pool.on("error", ({ source, error }) => logger.error("Worker pool error", { source, error }));

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) process.exit(1);
    shuttingDown = true;
    await pool.close();
    process.exit(130);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  // Batches run concurrently, at most one per worker, and are written in input order.
  const inFlight: Promise<string[]>[] = [];
  const writeOldest = async () => {
    const next = inFlight.shift();
    if (next) await writeLines(await next);
  };

  try {
    let batch: string[] = [];
    for await (const line of createInterface({ input: process.stdin, crlfDelay: Infinity })) {
      batch.push(line);
      if (batch.length < config.batchSize) continue;
      inFlight.push(pool.transform(batch));
      batch = [];
      if (inFlight.length >= pool.size) await writeOldest();
    }
    if (batch.length > 0) inFlight.push(pool.transform(batch));
    while (inFlight.length > 0) await writeOldest();
  } finally {
    await pool.close();
  }
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);
  switch (parsed.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "error":
      console.error(`Error: ${parsed.message}\nRun with --help for usage.`);
      process.exit(1);
    case "run":
      try {
        await run(parsed.config);
      } catch (err) {
        if (err instanceof ConfigError) {
          console.error(`Error: ${err.message}`);
          process.exit(1);
        }
        throw err;
      }
  }
}

main().catch((err) => {
  console.error("Fatal error:", errorMessage(err));
  process.exit(1);
});
