/**
 * Provider for a local Ollama server.
 *
 * The server needs no credentials; it counts as authenticated while it is
 * reachable and lists at least one chat model.
 */

import { HttpClient } from "../../http";
import { LanguageModelSettings } from "../../settings";
import { providerId, providerName } from "../../types";
import { LanguageModel } from "../languageModel";
import { BaseLanguageModelProvider, ConfigurationView, ProviderContext, ProviderLimits } from "../provider";
import { RateLimiter } from "../rateLimiter";
import { OllamaLanguageModel } from "./OllamaAdapter";
import { OllamaClient } from "./OllamaClient";
import { createOllamaModel, isEmbeddingModel } from "./models";
import { OllamaModel } from "./types";

export const OLLAMA_PROVIDER_ID = providerId("ollama");
export const OLLAMA_PROVIDER_NAME = providerName("Ollama");
export const OLLAMA_DOWNLOAD_URL = "https://ollama.com/download";
export const OLLAMA_LIBRARY_URL = "https://ollama.com/library";

export class OllamaLanguageModelProvider extends BaseLanguageModelProvider<OllamaModel> {
  private readonly client: OllamaClient;

  constructor(context: ProviderContext, http: HttpClient) {
    super(OLLAMA_PROVIDER_ID, OLLAMA_PROVIDER_NAME, context, "ollama");
    this.client = new OllamaClient(http, OLLAMA_PROVIDER_ID);
    this.start();
  }

  configurationView(): ConfigurationView {
    const authenticated = this.isAuthenticated();
    return {
      providerId: this.id,
      authenticated,
      title: authenticated ? "Ollama configured" : "Ollama not reachable",
      description: authenticated
        ? `${this.state().models.length} model(s) available at ${this.context.settings.get().ollama.apiUrl}`
        : "Ollama must be running on this machine with at least one model downloaded.",
      links: [
        { label: "Get Ollama", url: OLLAMA_DOWNLOAD_URL },
        { label: "View Available Models", url: OLLAMA_LIBRARY_URL },
      ],
      retry: () => this.resetCredentials(),
    };
  }

  protected async probe(): Promise<OllamaModel[]> {
    const { apiUrl, lowSpeedTimeoutMs } = this.context.settings.get().ollama;
    const models = await this.client.getModels(apiUrl, { lowSpeedTimeoutMs });
    // The API has no flag for embedding models
    return models.filter((model) => !isEmbeddingModel(model.name)).map((model) => createOllamaModel(model.name));
  }

  protected createModel(descriptor: OllamaModel, limiter: RateLimiter): LanguageModel {
    return new OllamaLanguageModel(
      descriptor,
      this.client,
      this.context.settings,
      { providerId: this.id, providerName: this.name },
      {
        eventBus: this.context.eventBus,
        logger: this.logger.child({ modelId: descriptor.id }),
        limiter,
        settings: this.context.settings,
        isAuthenticated: () => this.isAuthenticated(),
      }
    );
  }

  protected async warmUp(descriptor: OllamaModel): Promise<void> {
    const { apiUrl, lowSpeedTimeoutMs } = this.context.settings.get().ollama;
    await this.client.preloadModel(apiUrl, descriptor.id, { lowSpeedTimeoutMs });
  }

  protected limits(settings: LanguageModelSettings): ProviderLimits {
    return settings.ollama;
  }
}

export function createOllamaProvider(context: ProviderContext, http: HttpClient): OllamaLanguageModelProvider {
  return new OllamaLanguageModelProvider(context, http);
}
