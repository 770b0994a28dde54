/**
 * In-process provider with scripted models, for local development and tests.
 * Runs through the same limiter, state and event plumbing as real backends.
 */

import { CredentialStore } from "../credentials";
import { AuthenticationRequiredError, BackendError, CancelledError } from "../errors";
import { LanguageModelSettings } from "../settings";
import {
  LanguageModelRequest,
  modelId,
  ModelId,
  modelName,
  ModelName,
  providerId,
  ProviderId,
  providerName,
  ProviderName,
} from "../types";
import { BaseLanguageModel, CompletionOperation, LanguageModel, LanguageModelContext } from "./languageModel";
import { BaseLanguageModelProvider, ConfigurationView, ProviderContext, ProviderLimits } from "./provider";
import { RefreshStrategy } from "./providerState";
import { RateLimiter } from "./rateLimiter";

export interface MockModelScript {
  id: string;
  name?: string;
  maxTokens?: number;
  /** Streamed in order; defaults to echoing the last user message word by word */
  deltas?: string[];
  /** Terminal error raised after the deltas */
  error?: Error;
  /** Rejects the call after admission, before any delta */
  setupError?: Error;
  /** Keep the stream open after the last delta until it is cancelled */
  holdOpen?: boolean;
  toolResults?: Record<string, unknown>;
  loadError?: Error;
}

export interface MockProviderOptions {
  id?: string;
  name?: string;
  models?: MockModelScript[];
  maxConcurrentRequests?: number;
  refreshStrategy?: RefreshStrategy;
  /** Require a stored credential for `url` before models are listed */
  credentials?: { store: CredentialStore; url: string };
}

export interface MockCallCounts {
  probe: number;
  completion: number;
  tool: number;
  load: number;
}

interface MockModelDescriptor {
  readonly id: string;
  readonly name: string;
  readonly script: MockModelScript;
}

export const DEFAULT_MOCK_MODELS: readonly MockModelScript[] = [{ id: "mock-echo", name: "Mock Echo" }];

function echo(request: LanguageModelRequest): string[] {
  const lastUser = [...request.messages].reverse().find((message) => message.role === "user");
  if (!lastUser || lastUser.content === "") return [];
  return lastUser.content.split(/(?<=\s)/);
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(new CancelledError());
      return;
    }
    signal.addEventListener("abort", () => reject(new CancelledError()), { once: true });
  });
}

async function* play(
  script: MockModelScript,
  request: LanguageModelRequest,
  signal: AbortSignal
): AsyncGenerator<string, void, undefined> {
  for (const delta of script.deltas ?? echo(request)) {
    if (signal.aborted) {
      throw new CancelledError();
    }
    yield delta;
  }
  if (script.error) {
    throw script.error;
  }
  if (script.holdOpen) {
    await waitForAbort(signal);
  }
}

class MockLanguageModel extends BaseLanguageModel {
  readonly id: ModelId;
  readonly name: ModelName;
  readonly supportsTools = true;
  private readonly toolResults: Map<string, unknown>;

  constructor(
    private readonly script: MockModelScript,
    readonly providerId: ProviderId,
    readonly providerName: ProviderName,
    private readonly counts: MockCallCounts,
    context: LanguageModelContext
  ) {
    super(context);
    this.id = modelId(script.id);
    this.name = modelName(script.name ?? script.id);
    this.toolResults = new Map(Object.entries(script.toolResults ?? {}));
  }

  maxTokenCount(): number {
    return this.script.maxTokens ?? 4096;
  }

  protected createCompletion(request: LanguageModelRequest): CompletionOperation {
    return async (signal) => {
      this.counts.completion++;
      if (this.script.setupError) {
        throw this.script.setupError;
      }
      return play(this.script, request, signal);
    };
  }

  protected async invokeTool(_request: LanguageModelRequest, name: string): Promise<unknown> {
    this.counts.tool++;
    if (!this.toolResults.has(name)) {
      throw new BackendError(`No scripted result for tool ${name}`, this.providerId);
    }
    return this.toolResults.get(name);
  }
}

export class MockLanguageModelProvider extends BaseLanguageModelProvider<MockModelDescriptor> {
  readonly calls: MockCallCounts = { probe: 0, completion: 0, tool: 0, load: 0 };
  private scripts: readonly MockModelScript[];
  private probeError?: Error;

  constructor(context: ProviderContext, private readonly options: MockProviderOptions = {}) {
    super(providerId(options.id ?? "mock"), providerName(options.name ?? "Mock"), context);
    this.scripts = options.models ?? DEFAULT_MOCK_MODELS;
    this.start();
  }

  /** Models reported by the next probe */
  setModels(scripts: readonly MockModelScript[]): void {
    this.scripts = scripts;
  }

  /** Make probes fail until called again without an error */
  failProbes(error?: Error): void {
    this.probeError = error;
  }

  configurationView(): ConfigurationView {
    return {
      providerId: this.id,
      authenticated: this.isAuthenticated(),
      title: `${this.name} provider`,
      description: "Scripted in-process models",
      links: [],
      retry: () => this.resetCredentials(),
    };
  }

  protected async probe(): Promise<MockModelDescriptor[]> {
    this.calls.probe++;
    if (this.probeError) {
      throw this.probeError;
    }

    const credentials = this.options.credentials;
    if (credentials && !(await credentials.store.read(credentials.url))) {
      throw new AuthenticationRequiredError(this.id);
    }

    return this.scripts.map((script) => ({ id: script.id, name: script.name ?? script.id, script }));
  }

  protected createModel(descriptor: MockModelDescriptor, limiter: RateLimiter): LanguageModel {
    return new MockLanguageModel(descriptor.script, this.id, this.name, this.calls, {
      eventBus: this.context.eventBus,
      logger: this.logger.child({ modelId: descriptor.id }),
      limiter,
      settings: this.context.settings,
      isAuthenticated: () => this.isAuthenticated(),
    });
  }

  protected async warmUp(descriptor: MockModelDescriptor): Promise<void> {
    this.calls.load++;
    if (descriptor.script.loadError) {
      throw descriptor.script.loadError;
    }
  }

  protected limits(_settings: LanguageModelSettings): ProviderLimits {
    return {
      maxConcurrentRequests: this.options.maxConcurrentRequests ?? 4,
      refreshStrategy: this.options.refreshStrategy ?? "coalesce",
    };
  }

  protected async clearCredentials(): Promise<void> {
    const credentials = this.options.credentials;
    if (credentials) {
      await credentials.store.delete(credentials.url);
    }
  }
}

export function createMockProvider(context: ProviderContext, options?: MockProviderOptions): MockLanguageModelProvider {
  return new MockLanguageModelProvider(context, options);
}
