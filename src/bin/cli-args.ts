import type { PoolConfig } from "../types/config.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface CliConfig {
  pool: PoolConfig;
  batchSize: number;
  verbose: boolean;
}

export type ParsedArgs =
  | { kind: "run"; config: CliConfig }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const DEFAULT_BATCH_SIZE = 500;

export const HELP_TEXT = `
  deobfuscate-lines: pipe stack traces through a pool of deobfuscation workers

  Usage: deobfuscate-lines --worker <path> --mapping <path> [options] < trace.txt

  Options:
    --worker <path>             Worker executable (required)
    --worker-arg <arg>          Argument placed before the mapping path (repeatable)
    --mapping <path>            Mapping file passed to every worker (required)
    --pool-size <n>             Number of worker processes (default: 4)
    --batch-size <n>            Lines per request (default: ${DEFAULT_BATCH_SIZE})
    --min-timeout-ms <n>        Minimum per-request timeout (default: 5000)
    --per-line-timeout-ms <n>   Timeout budget per line (default: 2)
    --verbose, -v               Debug logging on stderr
    --help, -h                  Show this help
`;

// ── Arg parsing ────────────────────────────────────────────────────────────

function parsePositive(flag: string, value: string | undefined): number | string {
  const parsed = Number(value);
  if (value === undefined || value === "" || !Number.isFinite(parsed) || parsed <= 0) {
    return `${flag} requires a positive number`;
  }
  return parsed;
}

/** Parse `process.argv`-shaped input (the first two entries are skipped). */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  let workerCommand: string | undefined;
  let mappingPath: string | undefined;
  const workerArgs: string[] = [];
  const numbers: Partial<
    Record<"poolSize" | "batchSize" | "minimumTimeoutMs" | "perLineTimeoutMs", number>
  > = {};
  let verbose = false;

  const numericFlags = {
    "--pool-size": "poolSize",
    "--batch-size": "batchSize",
    "--min-timeout-ms": "minimumTimeoutMs",
    "--per-line-timeout-ms": "perLineTimeoutMs",
  } as const;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--worker":
        workerCommand = argv[++i];
        break;
      case "--worker-arg": {
        const value = argv[++i];
        if (value === undefined) return { kind: "error", message: "--worker-arg requires a value" };
        workerArgs.push(value);
        break;
      }
      case "--mapping":
        mappingPath = argv[++i];
        break;
      case "--pool-size":
      case "--batch-size":
      case "--min-timeout-ms":
      case "--per-line-timeout-ms": {
        const parsed = parsePositive(arg, argv[++i]);
        if (typeof parsed === "string") return { kind: "error", message: parsed };
        numbers[numericFlags[arg]] = parsed;
        break;
      }
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option: ${arg}` };
    }
  }

  if (!workerCommand) return { kind: "error", message: "--worker is required" };
  if (!mappingPath) return { kind: "error", message: "--mapping is required" };

  const batchSize = numbers.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize)) {
    return { kind: "error", message: "--batch-size requires a whole number" };
  }

  return {
    kind: "run",
    config: {
      pool: {
        workerCommand,
        workerArgs,
        mappingPath,
        poolSize: numbers.poolSize,
        minimumTimeoutMs: numbers.minimumTimeoutMs,
        perLineTimeoutMs: numbers.perLineTimeoutMs,
      },
      batchSize,
      verbose,
    },
  };
}
