/**
 * Counting admission gate for in-flight model requests.
 *
 * Callers beyond capacity wait in FIFO order; nothing is ever rejected for
 * load. A released permit is handed straight to the next waiter, so `active`
 * never exceeds `capacity` even for a moment.
 */

import { CancelledError } from "../errors";
import { ModelHubLogger } from "../logger";

export interface Permit {
  /** Idempotent */
  release(): void;
}

interface Waiter {
  resolve: (permit: Permit) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class RateLimiter {
  readonly capacity: number;
  private inFlight = 0;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number, private readonly logger?: ModelHubLogger) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RateLimiter capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get active(): number {
    return this.inFlight;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError("Cancelled while waiting for a request slot"));
    }

    if (this.inFlight < this.capacity) {
      this.inFlight++;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new CancelledError("Cancelled while waiting for a request slot"));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Run `operation` while holding a permit; the permit is released on every
   * exit path.
   */
  async run<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await operation();
    } finally {
      permit.release();
    }
  }

  /**
   * Acquire a permit, start the stream, and keep the permit until the stream
   * is drained, fails, is abandoned or `signal` aborts. A rejected `operation`
   * releases the permit and rejects without producing a stream.
   */
  async stream<T>(
    operation: (signal: AbortSignal) => Promise<AsyncIterable<T>>,
    signal?: AbortSignal
  ): Promise<LimitedStream<T>> {
    const permit = await this.acquire(signal);
    const controller = new AbortController();
    let limited: LimitedStream<T> | undefined;
    // Before the stream exists the abort reaches the operation; afterwards it ends the stream
    const onCallerAbort = () => {
      if (limited) {
        limited.interrupt();
      } else {
        controller.abort();
      }
    };
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const cleanup = () => {
      signal?.removeEventListener("abort", onCallerAbort);
      permit.release();
    };

    let source: AsyncIterable<T>;
    try {
      source = await operation(controller.signal);
    } catch (error) {
      cleanup();
      throw error;
    }
    limited = new LimitedStream(source, controller, cleanup, this.logger);
    if (signal?.aborted) {
      limited.interrupt();
    }
    return limited;
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.inFlight--;
      return;
    }
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener("abort", next.onAbort);
    }
    next.resolve(this.createPermit());
  }
}

/**
 * Single-consumer stream that owns a RateLimiter permit. Ends exactly once:
 * after that it yields nothing and the permit is back in the pool.
 */
export class LimitedStream<T> implements AsyncIterable<T> {
  private iterator?: AsyncIterator<T>;
  private finished = false;
  private pulling = false;
  /** Raised by the next pull after the caller's signal ended the stream */
  private interruption?: CancelledError;

  constructor(
    private readonly source: AsyncIterable<T>,
    private readonly controller: AbortController,
    private readonly onFinish: () => void,
    private readonly logger?: ModelHubLogger
  ) {}

  get isFinished(): boolean {
    return this.finished;
  }

  /** Aborted when the stream is cancelled; adapters pass it to the transport */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterator) {
      throw new Error("Stream already consumed");
    }
    const inner = this.source[Symbol.asyncIterator]();
    this.iterator = inner;

    return {
      next: async (): Promise<IteratorResult<T>> => {
        if (this.finished) {
          return this.ended();
        }
        this.pulling = true;
        let result: IteratorResult<T>;
        try {
          result = await inner.next();
        } catch (error) {
          if (this.finished) {
            // The failure is the abort caused by cancel(); the stream already ended
            return this.ended();
          }
          this.finish();
          throw error;
        } finally {
          this.pulling = false;
        }

        if (this.finished) {
          // Cancelled while the pull was in flight
          await this.closeSource();
          return this.ended();
        }
        if (result.done) {
          this.finish();
        }
        return result;
      },
      return: async (): Promise<IteratorResult<T>> => {
        await this.cancel();
        return { done: true, value: undefined };
      },
    };
  }

  /**
   * Stop the stream: aborts the request, closes the source and releases the
   * permit. Safe to call at any time and more than once; never rejects.
   */
  async cancel(): Promise<void> {
    if (this.finished) return;
    this.finish();
    this.controller.abort();
    // A pending pull observes the abort itself and closes the source after it settles
    if (!this.pulling) {
      await this.closeSource();
    }
  }

  /**
   * End the stream because the caller's signal fired. The permit is released
   * at once and the consumer's next pull rejects with CancelledError.
   */
  interrupt(): void {
    if (this.finished) return;
    this.interruption = new CancelledError();
    void this.cancel();
  }

  private ended(): IteratorResult<T> {
    const interruption = this.interruption;
    if (interruption) {
      this.interruption = undefined;
      throw interruption;
    }
    return { done: true, value: undefined };
  }

  private async closeSource(): Promise<void> {
    try {
      await this.iterator?.return?.();
    } catch (error) {
      // The request is already aborted and the permit released
      this.logger?.debug("Stream source failed to close after cancel", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.onFinish();
  }
}
