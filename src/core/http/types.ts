/**
 * Transport capability consumed by backend adapters
 */

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  /** Abort when no data arrives within this window; surfaced as TimeoutError */
  lowSpeedTimeoutMs?: number;
}

export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly ok: boolean;
  /** Single-use byte stream. Leaving the loop early cancels the request. */
  readonly body: AsyncIterable<Uint8Array>;
  text(): Promise<string>;
}

export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}
