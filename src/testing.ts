/**
 * Public test utilities, exported from the `"deobfuscation-pool/testing"` entry point.
 * Consumers can run a WorkerPool against scripted in-process workers.
 */
export type {
  FakeWorker,
  FakeWorkerBehavior,
  MappingWorkerOptions,
} from "./testing/mock-process-manager.js";
export {
  brokenPipeWorker,
  crashOnInputWorker,
  DEFAULT_SENTINEL_PATTERN,
  echoWorker,
  exitOnSpawnWorker,
  FakeWorkerProcess,
  MockProcessManager,
  mappingWorker,
  silentWorker,
  taggingWorker,
} from "./testing/mock-process-manager.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
