/**
 * RateLimiter Tests
 */

import { CancelledError } from "../src/core/errors";
import { RateLimiter } from "../src/core/models/rateLimiter";
import { deferred, flushPromises } from "./support/helpers";

async function* untilAborted(values: string[], signal: AbortSignal): AsyncGenerator<string, void, undefined> {
  yield* values;
  await new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

describe("RateLimiter", () => {
  test("rejects a capacity that is not a positive integer", () => {
    expect(() => new RateLimiter(0)).toThrow(RangeError);
    expect(() => new RateLimiter(1.5)).toThrow(RangeError);
  });

  describe("run", () => {
    test("runs at most N operations at once; the N+1th waits for a slot", async () => {
      const limiter = new RateLimiter(2);
      const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
      const started: number[] = [];
      let running = 0;
      let peak = 0;

      const runs = gates.map((gate, i) =>
        limiter.run(async () => {
          started.push(i);
          running++;
          peak = Math.max(peak, running);
          await gate.promise;
          running--;
          return i;
        })
      );

      await flushPromises();
      expect(started).toEqual([0, 1]);
      expect(limiter.active).toBe(2);
      expect(limiter.pending).toBe(1);

      gates[1].resolve();
      await flushPromises();
      expect(started).toEqual([0, 1, 2]);
      expect(limiter.active).toBe(2);

      gates[0].resolve();
      gates[2].resolve();
      await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
      expect(peak).toBe(2);
      expect(limiter.active).toBe(0);
    });

    test("admits waiters in FIFO order", async () => {
      const limiter = new RateLimiter(1);
      const gate = deferred<void>();
      const order: string[] = [];

      const first = limiter.run(() => gate.promise);
      const rest = ["a", "b", "c"].map((name) =>
        limiter.run(async () => {
          order.push(name);
        })
      );

      gate.resolve();
      await Promise.all([first, ...rest]);
      expect(order).toEqual(["a", "b", "c"]);
    });

    test("releases the permit when the operation fails", async () => {
      const limiter = new RateLimiter(1);

      await expect(limiter.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
      expect(limiter.active).toBe(0);
      await expect(limiter.run(async () => "next")).resolves.toBe("next");
    });
  });

  describe("acquire", () => {
    test("permit release is idempotent", async () => {
      const limiter = new RateLimiter(2);
      const first = await limiter.acquire();
      await limiter.acquire();

      first.release();
      first.release();
      expect(limiter.active).toBe(1);
    });

    test("aborting a queued waiter removes it and rejects with CancelledError", async () => {
      const limiter = new RateLimiter(1);
      const held = await limiter.acquire();
      const controller = new AbortController();

      const waiting = limiter.acquire(controller.signal);
      expect(limiter.pending).toBe(1);

      controller.abort();
      await expect(waiting).rejects.toBeInstanceOf(CancelledError);
      expect(limiter.pending).toBe(0);

      held.release();
      expect(limiter.active).toBe(0);
    });

    test("an already aborted signal never takes a slot", async () => {
      const limiter = new RateLimiter(1);
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(limiter.active).toBe(0);
    });
  });

  describe("stream", () => {
    test("holds the permit for the stream's lifetime", async () => {
      const limiter = new RateLimiter(2);
      const first = await limiter.stream((signal) => Promise.resolve(untilAborted(["a"], signal)));
      const second = await limiter.stream((signal) => Promise.resolve(untilAborted(["b"], signal)));

      let thirdStarted = false;
      const third = limiter.stream(async (signal) => {
        thirdStarted = true;
        return untilAborted([], signal);
      });

      await flushPromises();
      expect(thirdStarted).toBe(false);
      expect(limiter.pending).toBe(1);

      await first.cancel();
      const thirdStream = await third;
      expect(thirdStarted).toBe(true);
      expect(limiter.active).toBe(2);

      await second.cancel();
      await thirdStream.cancel();
      expect(limiter.active).toBe(0);
    });

    test("releases the permit once the stream is drained", async () => {
      const limiter = new RateLimiter(1);
      const stream = await limiter.stream(async () =>
        (async function* () {
          yield "x";
          yield "y";
        })()
      );

      const seen: string[] = [];
      for await (const value of stream) {
        seen.push(value);
      }

      expect(seen).toEqual(["x", "y"]);
      expect(stream.isFinished).toBe(true);
      expect(limiter.active).toBe(0);
    });

    test("breaking out of for-await aborts the operation and releases the permit", async () => {
      const limiter = new RateLimiter(1);
      let captured: AbortSignal | undefined;
      const stream = await limiter.stream(async (signal) => {
        captured = signal;
        return untilAborted(["a", "b"], signal);
      });

      const seen: string[] = [];
      for await (const value of stream) {
        seen.push(value);
        break;
      }

      expect(seen).toEqual(["a"]);
      expect(captured?.aborted).toBe(true);
      expect(limiter.active).toBe(0);
    });

    test("an error ends the stream; nothing is yielded afterwards", async () => {
      const limiter = new RateLimiter(1);
      const stream = await limiter.stream(async () =>
        (async function* () {
          yield "one";
          throw new Error("backend failed");
        })()
      );
      const iterator = stream[Symbol.asyncIterator]();

      await expect(iterator.next()).resolves.toEqual({ done: false, value: "one" });
      await expect(iterator.next()).rejects.toThrow("backend failed");
      await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
      expect(limiter.active).toBe(0);
    });

    test("a failed setup releases the permit and produces no stream", async () => {
      const limiter = new RateLimiter(1);

      await expect(
        limiter.stream(async () => {
          throw new Error("setup failed");
        })
      ).rejects.toThrow("setup failed");
      expect(limiter.active).toBe(0);
    });

    test("cancel during a pending pull ends the stream", async () => {
      const limiter = new RateLimiter(1);
      const stream = await limiter.stream(async (signal) => untilAborted([], signal));
      const iterator = stream[Symbol.asyncIterator]();

      const pending = iterator.next();
      await stream.cancel();

      await expect(pending).resolves.toEqual({ done: true, value: undefined });
      expect(limiter.active).toBe(0);
    });

    test("the caller's signal aborts the operation and releases the permit of an idle stream", async () => {
      const limiter = new RateLimiter(1);
      const controller = new AbortController();
      let captured: AbortSignal | undefined;
      const stream = await limiter.stream(async (signal) => {
        captured = signal;
        return untilAborted(["a"], signal);
      }, controller.signal);

      controller.abort();

      expect(captured?.aborted).toBe(true);
      expect(stream.isFinished).toBe(true);
      expect(limiter.active).toBe(0);
      const iterator = stream[Symbol.asyncIterator]();
      await expect(iterator.next()).rejects.toBeInstanceOf(CancelledError);
      await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    });

    test("an abandoned stream whose caller aborts lets the next request in", async () => {
      const limiter = new RateLimiter(1);
      const controller = new AbortController();
      const abandoned = await limiter.stream(async (signal) => untilAborted(["a"], signal), controller.signal);
      let admitted = false;
      const next = limiter.stream(async (signal) => {
        admitted = true;
        return untilAborted([], signal);
      });

      await flushPromises();
      expect(admitted).toBe(false);

      controller.abort();
      const stream = await next;

      expect(abandoned.isFinished).toBe(true);
      expect(admitted).toBe(true);
      expect(limiter.active).toBe(1);
      await stream.cancel();
    });

    test("the caller's signal rejects a pending pull with CancelledError", async () => {
      const limiter = new RateLimiter(1);
      const controller = new AbortController();
      const stream = await limiter.stream(async (signal) => untilAborted([], signal), controller.signal);
      const iterator = stream[Symbol.asyncIterator]();

      const pending = iterator.next();
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(limiter.active).toBe(0);
    });

    test("an already aborted caller signal ends the stream as soon as it is created", async () => {
      const limiter = new RateLimiter(1);
      const controller = new AbortController();
      const stream = await limiter.stream(async (signal) => {
        controller.abort();
        return untilAborted(["a"], signal);
      }, controller.signal);

      expect(stream.isFinished).toBe(true);
      expect(stream.signal.aborted).toBe(true);
      expect(limiter.active).toBe(0);
    });

    test("cancel and break succeed even when the source fails to close", async () => {
      const limiter = new RateLimiter(2);
      const failingToClose = (): AsyncIterable<string> => ({
        [Symbol.asyncIterator]: () => ({
          next: async () => ({ done: false, value: "a" }),
          return: async () => {
            throw new Error("This operation was aborted");
          },
        }),
      });

      const cancelled = await limiter.stream(async () => failingToClose());
      await expect(cancelled[Symbol.asyncIterator]().next()).resolves.toEqual({ done: false, value: "a" });
      await expect(cancelled.cancel()).resolves.toBeUndefined();

      const broken = await limiter.stream(async () => failingToClose());
      const seen: string[] = [];
      for await (const value of broken) {
        seen.push(value);
        break;
      }

      expect(seen).toEqual(["a"]);
      expect(limiter.active).toBe(0);
    });

    test("a stream can only be iterated once", async () => {
      const limiter = new RateLimiter(1);
      const stream = await limiter.stream(async (signal) => untilAborted([], signal));

      stream[Symbol.asyncIterator]();
      expect(() => stream[Symbol.asyncIterator]()).toThrow("Stream already consumed");
      await stream.cancel();
    });
  });
});
