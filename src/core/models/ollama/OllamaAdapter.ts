/**
 * LanguageModel backed by a model installed on an Ollama server
 */

import { UnsupportedOperationError } from "../../errors";
import { SettingsStore } from "../../settings";
import { LanguageModelRequest, modelId, Role, ModelId, modelName, ModelName, ProviderId, ProviderName } from "../../types";
import { BaseLanguageModel, CompletionOperation, LanguageModelContext } from "../languageModel";
import { OllamaClient } from "./OllamaClient";
import { ChatRequest, ChatResponseDelta, OllamaModel, OllamaRole } from "./types";

export interface OllamaModelIdentity {
  providerId: ProviderId;
  providerName: ProviderName;
}

const ROLE_TAGS: Readonly<Record<Role, OllamaRole>> = {
  system: "system",
  user: "user",
  assistant: "assistant",
};

async function* contentOf(deltas: AsyncIterable<ChatResponseDelta>): AsyncGenerator<string, void, undefined> {
  for await (const delta of deltas) {
    // The closing line repeats the role with no text
    if (delta.done && delta.message.content === "") continue;
    yield delta.message.content;
  }
}

export class OllamaLanguageModel extends BaseLanguageModel {
  readonly id: ModelId;
  readonly name: ModelName;
  readonly providerId: ProviderId;
  readonly providerName: ProviderName;
  readonly supportsTools = false;

  constructor(
    private readonly model: OllamaModel,
    private readonly client: OllamaClient,
    private readonly settings: SettingsStore,
    identity: OllamaModelIdentity,
    context: LanguageModelContext
  ) {
    super(context);
    this.id = modelId(model.id);
    this.name = modelName(model.displayName);
    this.providerId = identity.providerId;
    this.providerName = identity.providerName;
  }

  maxTokenCount(): number {
    return this.model.maxTokens;
  }

  toChatRequest(request: LanguageModelRequest): ChatRequest {
    return {
      model: this.model.name,
      messages: request.messages.map((message) => ({ role: ROLE_TAGS[message.role], content: message.content })),
      keep_alive: this.settings.get().ollama.keepAlive,
      stream: true,
      options: {
        num_ctx: this.model.maxTokens,
        stop: [...request.stop],
        temperature: request.temperature,
      },
    };
  }

  protected createCompletion(request: LanguageModelRequest): CompletionOperation {
    const chatRequest = this.toChatRequest(request);
    const { apiUrl, lowSpeedTimeoutMs } = this.settings.get().ollama;

    return async (signal) => {
      const deltas = await this.client.streamChatCompletion(apiUrl, chatRequest, { signal, lowSpeedTimeoutMs });
      return contentOf(deltas);
    };
  }

  protected async invokeTool(): Promise<unknown> {
    throw new UnsupportedOperationError("useAnyTool", this.providerId);
  }
}
