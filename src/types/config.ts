import { poolConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Worker pool configuration. Only the command and mapping file are required. */
export interface PoolConfig {
  /** Worker executable; invoked as `workerCommand ...workerArgs mappingPath`. */
  workerCommand: string;
  /** Leading arguments, e.g. `["-jar", "retrace.jar"]` for a JVM worker. */
  workerArgs?: string[]; // default: []
  mappingPath: string;

  poolSize?: number; // default: 4

  // Timeouts: max(minimumTimeoutMs, lines * perLineTimeoutMs)
  minimumTimeoutMs?: number; // default: 5000, covers process start-up
  perLineTimeoutMs?: number; // default: 2, about 500 lines per second

  cwd?: string; // default: process.cwd()
  env?: Record<string, string>;
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<PoolConfig, "env">> & Pick<PoolConfig, "env">;

export const DEFAULT_CONFIG: Pick<
  ResolvedConfig,
  "workerArgs" | "poolSize" | "minimumTimeoutMs" | "perLineTimeoutMs"
> = {
  workerArgs: [],
  poolSize: 4,
  minimumTimeoutMs: 5000,
  perLineTimeoutMs: 2,
};

export function resolveConfig(config: PoolConfig): ResolvedConfig {
  const validation = poolConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const data = validation.data;
  return {
    workerCommand: data.workerCommand,
    workerArgs: data.workerArgs ?? [...DEFAULT_CONFIG.workerArgs],
    mappingPath: data.mappingPath,
    poolSize: data.poolSize ?? DEFAULT_CONFIG.poolSize,
    minimumTimeoutMs: data.minimumTimeoutMs ?? DEFAULT_CONFIG.minimumTimeoutMs,
    perLineTimeoutMs: data.perLineTimeoutMs ?? DEFAULT_CONFIG.perLineTimeoutMs,
    cwd: data.cwd ?? process.cwd(),
    env: data.env,
  };
}
