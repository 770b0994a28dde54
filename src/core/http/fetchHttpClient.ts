/**
 * HttpClient backed by the global fetch
 */

import { BackendUnreachableError, CancelledError, ModelHubError, TimeoutError } from "../errors";
import { HttpClient, HttpRequest, HttpResponse } from "./types";
import { readText } from "./lines";

export interface BodyReaderLike {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

export interface FetchResponseLike {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly body: { getReader(): BodyReaderLike } | null;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

/**
 * Races each step of one request against the low-speed window and the
 * caller's abort signal. Either one aborts the underlying fetch.
 */
class RequestGuard {
  readonly controller = new AbortController();

  constructor(private readonly request: HttpRequest) {}

  async step<T>(promise: Promise<T>): Promise<T> {
    const { signal, lowSpeedTimeoutMs, url } = this.request;
    if (signal?.aborted) {
      this.controller.abort();
      throw new CancelledError();
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const interrupt = new Promise<never>((_, reject) => {
      if (lowSpeedTimeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.controller.abort();
          reject(new TimeoutError(`No data received from ${url} for ${lowSpeedTimeoutMs}ms`, lowSpeedTimeoutMs));
        }, lowSpeedTimeoutMs);
      }
      if (signal) {
        onAbort = () => {
          this.controller.abort();
          reject(new CancelledError());
        };
        signal.addEventListener("abort", onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([promise, interrupt]);
    } catch (error) {
      throw toTransportError(error, url);
    } finally {
      clearTimeout(timer);
      if (onAbort) {
        signal?.removeEventListener("abort", onAbort);
      }
    }
  }
}

function toTransportError(error: unknown, url: string): ModelHubError {
  if (error instanceof ModelHubError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendUnreachableError(`Request to ${url} failed: ${message}`, url, undefined, error);
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init)) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const guard = new RequestGuard(request);
    const response = await guard.step(
      this.fetchImpl(request.url, {
        method: request.method,
        headers: { Accept: "application/json", ...request.headers },
        body: request.body,
        signal: guard.controller.signal,
      })
    );

    const body = this.readBody(response, guard);
    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      body,
      text: () => readText(body),
    };
  }

  private async *readBody(
    response: FetchResponseLike,
    guard: RequestGuard
  ): AsyncGenerator<Uint8Array, void, undefined> {
    if (!response.body) return;

    const reader = response.body.getReader();
    // Set when the stream ended on its own or errored; otherwise the consumer
    // walked away and the request must be torn down.
    let settled = false;
    try {
      while (true) {
        const { done, value } = await guard.step(reader.read());
        if (done) {
          settled = true;
          return;
        }
        if (value && value.byteLength > 0) {
          yield value;
        }
      }
    } catch (error) {
      settled = true;
      throw error;
    } finally {
      if (!settled) {
        // Cancel before aborting: once aborted, fetch errors the body and cancel() rejects with it
        await reader.cancel().catch(() => undefined);
        guard.controller.abort();
      }
    }
  }
}
