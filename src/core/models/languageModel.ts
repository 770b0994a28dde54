/**
 * LanguageModel contract and the shared completion pipeline.
 *
 * Backends implement `createCompletion`/`invokeTool`; BaseLanguageModel owns
 * request validation, the authentication gate, admission through the model's
 * RateLimiter and model events.
 */

import { EventBus } from "../eventBus";
import {
  AuthenticationRequiredError,
  CancelledError,
  HostShutdownError,
  toModelHubError,
  UnsupportedOperationError,
} from "../errors";
import { ModelHubLogger } from "../logger";
import { SettingsStore } from "../settings";
import {
  LanguageModelRequest,
  ModelId,
  ModelName,
  ProviderId,
  ProviderName,
  validateRequest,
} from "../types";
import { LimitedStream, RateLimiter } from "./rateLimiter";
import { JsonSchema, validateToolOutput } from "./tool";

/**
 * Text deltas in backend arrival order. Iterate once; `cancel()` or leaving a
 * `for await` loop early aborts the request and frees the request slot.
 */
export type CompletionStream = LimitedStream<string>;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface LanguageModel {
  readonly id: ModelId;
  readonly name: ModelName;
  readonly providerId: ProviderId;
  readonly providerName: ProviderName;
  readonly telemetryId: string;

  /** Context window declared for the model */
  maxTokenCount(): number;
  countTokens(request: LanguageModelRequest): Promise<number>;
  streamCompletion(request: LanguageModelRequest, options?: CallOptions): Promise<CompletionStream>;
  useAnyTool(
    request: LanguageModelRequest,
    name: string,
    description: string,
    schema: JsonSchema,
    options?: CallOptions
  ): Promise<unknown>;
}

/**
 * Heuristic for backends without a tokenizer endpoint: code points / 4
 */
export function estimateTokenCount(request: LanguageModelRequest): number {
  let characters = 0;
  for (const message of request.messages) {
    characters += [...message.content].length;
  }
  return Math.floor(characters / 4);
}

/**
 * Drain a completion into one string
 */
export async function collectCompletion(stream: AsyncIterable<string>): Promise<string> {
  let text = "";
  for await (const delta of stream) {
    text += delta;
  }
  return text;
}

export interface LanguageModelContext {
  eventBus: EventBus;
  logger: ModelHubLogger;
  limiter: RateLimiter;
  settings: SettingsStore;
  /** Reads the owning provider's current snapshot */
  isAuthenticated(): boolean;
}

/** Backend call started once a request slot is granted */
export type CompletionOperation = (signal: AbortSignal) => Promise<AsyncIterable<string>>;

export abstract class BaseLanguageModel implements LanguageModel {
  abstract readonly id: ModelId;
  abstract readonly name: ModelName;
  abstract readonly providerId: ProviderId;
  abstract readonly providerName: ProviderName;
  abstract readonly supportsTools: boolean;

  protected constructor(protected readonly context: LanguageModelContext) {}

  get telemetryId(): string {
    return `${this.providerId}/${this.id}`;
  }

  abstract maxTokenCount(): number;

  async countTokens(request: LanguageModelRequest): Promise<number> {
    return estimateTokenCount(validateRequest(request));
  }

  async streamCompletion(request: LanguageModelRequest, options: CallOptions = {}): Promise<CompletionStream> {
    const validated = validateRequest(request);
    this.ensureAuthenticated();
    if (this.context.settings.isDisposed) {
      throw new HostShutdownError();
    }
    // Settings are read here, before a slot is taken
    const operation = this.createCompletion(validated);

    this.context.eventBus.emit("ModelRequestEvent", {
      providerId: this.providerId,
      modelId: this.id,
      messageCount: validated.messages.length,
    });

    const startedAt = Date.now();
    try {
      return await this.context.limiter.stream(
        async (signal) => this.observe(await operation(signal), startedAt),
        options.signal
      );
    } catch (error) {
      this.reportFailure(error, startedAt, 0, 0);
      throw error;
    }
  }

  async useAnyTool(
    request: LanguageModelRequest,
    name: string,
    description: string,
    schema: JsonSchema,
    options: CallOptions = {}
  ): Promise<unknown> {
    const validated = validateRequest(request);
    if (!this.supportsTools) {
      throw new UnsupportedOperationError("useAnyTool", this.providerId);
    }
    this.ensureAuthenticated();

    const value = await this.context.limiter.run(
      () => this.invokeTool(validated, name, description, schema, options.signal),
      options.signal
    );
    return validateToolOutput(name, schema, value);
  }

  /**
   * Translate the request synchronously and return the deferred backend call.
   * Throwing here rejects `streamCompletion` before a slot is taken.
   */
  protected abstract createCompletion(request: LanguageModelRequest): CompletionOperation;

  protected abstract invokeTool(
    request: LanguageModelRequest,
    name: string,
    description: string,
    schema: JsonSchema,
    signal?: AbortSignal
  ): Promise<unknown>;

  private ensureAuthenticated(): void {
    if (!this.context.isAuthenticated()) {
      throw new AuthenticationRequiredError(this.providerId);
    }
  }

  private async *observe(source: AsyncIterable<string>, startedAt: number): AsyncGenerator<string, void, undefined> {
    let deltaCount = 0;
    let characters = 0;
    let completed = false;
    try {
      for await (const delta of source) {
        deltaCount++;
        characters += delta.length;
        yield delta;
      }
      completed = true;
    } catch (error) {
      this.reportFailure(error, startedAt, deltaCount, characters);
      throw error;
    } finally {
      if (completed) {
        const durationMs = Date.now() - startedAt;
        this.context.eventBus.emit("ModelResponseEvent", {
          providerId: this.providerId,
          modelId: this.id,
          deltaCount,
          durationMs,
        });
        this.context.logger.traceModelCall(this.telemetryId, { durationMs, deltaCount, characters });
      }
    }
  }

  private reportFailure(error: unknown, startedAt: number, deltaCount: number, characters: number): void {
    if (error instanceof CancelledError) {
      this.context.logger.debug("Completion cancelled", { telemetryId: this.telemetryId, deltaCount });
      return;
    }
    const normalized = toModelHubError(error);
    this.context.eventBus.emit("ModelErrorEvent", {
      providerId: this.providerId,
      modelId: this.id,
      code: normalized.code,
      message: normalized.message,
    });
    this.context.logger.traceModelCall(this.telemetryId, {
      durationMs: Date.now() - startedAt,
      deltaCount,
      characters,
      error: normalized.message,
    });
  }
}
