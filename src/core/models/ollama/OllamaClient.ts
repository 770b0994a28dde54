/**
 * HTTP client for the Ollama REST API
 */

import { BackendError, BackendUnreachableError, InvalidResponseError } from "../../errors";
import { HttpClient, HttpResponse, readLines } from "../../http";
import {
  ChatRequest,
  ChatResponseDelta,
  ChatResponseDeltaSchema,
  ErrorResponseSchema,
  LocalModel,
  LocalModelsResponseSchema,
} from "./types";

export interface OllamaRequestOptions {
  signal?: AbortSignal;
  lowSpeedTimeoutMs?: number;
}

const PRELOAD_KEEP_ALIVE = "15m";

function endpoint(apiUrl: string, path: string): string {
  return `${apiUrl.replace(/\/+$/, "")}${path}`;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidResponseError(`not valid JSON (${reason})`, text);
  }
}

export class OllamaClient {
  constructor(
    private readonly http: HttpClient,
    private readonly providerId: string = "ollama"
  ) {}

  /**
   * Models installed on the server (`GET /api/tags`)
   */
  async getModels(apiUrl: string, options: OllamaRequestOptions = {}): Promise<LocalModel[]> {
    const url = endpoint(apiUrl, "/api/tags");
    const response = await this.http.send({ method: "GET", url, ...options });
    await this.ensureOk(response, url);

    const text = await response.text();
    const parsed = LocalModelsResponseSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new InvalidResponseError(`unexpected model list: ${parsed.error.issues[0]?.message ?? "invalid"}`, text);
    }
    return parsed.data.models;
  }

  /**
   * Ask the server to load `model` into memory ahead of the first request
   */
  async preloadModel(apiUrl: string, model: string, options: OllamaRequestOptions = {}): Promise<void> {
    const url = endpoint(apiUrl, "/api/generate");
    const response = await this.http.send({
      method: "POST",
      url,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model, keep_alive: PRELOAD_KEEP_ALIVE }),
      ...options,
    });
    await this.ensureOk(response, url);
    // Drain so the connection is released
    await response.text();
  }

  /**
   * `POST /api/chat` with `stream: true`; yields one delta per NDJSON line.
   * An `{"error": ...}` line ends the sequence with BackendError.
   */
  async streamChatCompletion(
    apiUrl: string,
    request: ChatRequest,
    options: OllamaRequestOptions = {}
  ): Promise<AsyncIterable<ChatResponseDelta>> {
    const url = endpoint(apiUrl, "/api/chat");
    const response = await this.http.send({
      method: "POST",
      url,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
      ...options,
    });
    await this.ensureOk(response, url);
    return this.parseDeltas(response.body);
  }

  private async *parseDeltas(body: AsyncIterable<Uint8Array>): AsyncGenerator<ChatResponseDelta, void, undefined> {
    for await (const line of readLines(body)) {
      const payload = parseJson(line);

      const failure = ErrorResponseSchema.safeParse(payload);
      if (failure.success) {
        throw new BackendError(failure.data.error, this.providerId);
      }

      const delta = ChatResponseDeltaSchema.safeParse(payload);
      if (!delta.success) {
        throw new InvalidResponseError(`unexpected chat delta: ${delta.error.issues[0]?.message ?? "invalid"}`, line);
      }
      yield delta.data;
    }
  }

  private async ensureOk(response: HttpResponse, url: string): Promise<void> {
    if (response.ok) return;

    const body = await response.text();
    throw new BackendUnreachableError(
      `Failed to connect to Ollama API: ${response.status} ${response.statusText} ${body}`.trim(),
      url,
      response.status
    );
  }
}
