export class DeobfuscationError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DeobfuscationError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ProcessError extends DeobfuscationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROCESS", options);
    this.name = "ProcessError";
  }
}

export class ConfigError extends DeobfuscationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/** Thrown when a pool is used after close(). Never degraded into a no-op. */
export class PoolClosedError extends DeobfuscationError {
  constructor(message = "transform() called on a closed WorkerPool", options?: ErrorOptions) {
    super(message, "POOL_CLOSED", options);
    this.name = "PoolClosedError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to DeobfuscationError (preserves cause chain). */
export function toDeobfuscationError(value: unknown): DeobfuscationError {
  if (value instanceof DeobfuscationError) return value;
  if (value instanceof Error) {
    return new DeobfuscationError(value.message, "UNKNOWN", { cause: value });
  }
  return new DeobfuscationError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
