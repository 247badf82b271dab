/**
 * Public API barrel.
 *
 * Re-exports the worker pool, its building blocks, and the adapters and
 * errors that make up the public surface of the package.
 * @module
 */

// Adapters
export type { ConsoleLoggerOptions } from "./adapters/console-logger.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export { NodeProcessManager } from "./adapters/node-process-manager.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { formatRecord, LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Configuration
export { poolConfigSchema } from "./config/config-schema.js";
// Core
export { Mutex } from "./core/mutex.js";
export type {
  DegradeReason,
  TimeoutPolicy,
  TransactionResult,
} from "./core/transaction.js";
export { computeTimeoutMs, createSentinel, frameRequest } from "./core/transaction.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
export type { WorkerHandleOptions } from "./core/worker-handle.js";
export { WorkerHandle } from "./core/worker-handle.js";
export type { WorkerPoolEventMap, WorkerPoolOptions, WorkerPoolStats } from "./core/worker-pool.js";
export { WorkerPool } from "./core/worker-pool.js";
// Errors
export {
  ConfigError,
  DeobfuscationError,
  errorMessage,
  PoolClosedError,
  ProcessError,
  toDeobfuscationError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { ProcessHandle, ProcessManager, SpawnOptions } from "./interfaces/process-manager.js";
// Types
export type { PoolConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
// Utils
export { LineBuffer, StreamLineReader } from "./utils/line-buffer.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
