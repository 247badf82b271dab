import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Unlike a bare EventEmitter, emitting "error" with no listener attached is a
 * no-op rather than a throw: pool errors are already logged, and an
 * unobserved event must not turn into a failed transform().
 *
 * ```ts
 * interface PoolEvents {
 *   "worker:restarted": { previousPid: number; pid: number };
 * }
 * class Pool extends TypedEventEmitter<PoolEvents> {}
 * const { pid } = await pool.waitFor("worker:restarted", 1000);
 * ```
 */
export class TypedEventEmitter<TEvents extends { [K in keyof TEvents]: unknown }> {
  private emitter = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  /** Resolve with the next payload of `event`; reject after `timeoutMs` if given. */
  waitFor<K extends keyof TEvents & string>(event: K, timeoutMs?: number): Promise<TEvents[K]> {
    return new Promise<TEvents[K]>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const listener = (payload: TEvents[K]) => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(payload);
      };
      this.emitter.once(event, listener);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.emitter.off(event, listener);
          reject(new Error(`Timed out after ${timeoutMs}ms waiting for "${event}"`));
        }, timeoutMs);
      }
    });
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    if (event === "error" && this.emitter.listenerCount(event) === 0) return false;
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
