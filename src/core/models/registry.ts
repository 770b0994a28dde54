/**
 * Registry of language model providers and the active model selection.
 *
 * One registry per hub; iteration follows registration order.
 */

import { EventBus, Unsubscribe } from "../eventBus";
import { AuthenticationRequiredError, ModelNotFoundError, ProviderNotFoundError } from "../errors";
import { ModelHubLogger } from "../logger";
import { ModelId, ProviderId } from "../types";
import { LanguageModel } from "./languageModel";
import { LanguageModelProvider } from "./provider";
import { ModelDescriptor, ProviderSnapshot } from "./providerState";

export type RegistryChange =
  | { type: "provider-registered"; providerId: ProviderId; replaced: boolean }
  | { type: "provider-removed"; providerId: ProviderId }
  | { type: "provider-state"; providerId: ProviderId; snapshot: ProviderSnapshot<ModelDescriptor> }
  | { type: "active-model"; model: LanguageModel | undefined };

export type RegistryListener = (change: RegistryChange) => void;

interface Registration {
  provider: LanguageModelProvider;
  unsubscribe: Unsubscribe;
}

export class LanguageModelRegistry {
  private readonly providers = new Map<string, Registration>();
  private readonly listeners = new Set<RegistryListener>();
  private active?: { providerId: ProviderId; modelId: ModelId };

  constructor(
    private readonly eventBus: EventBus,
    private readonly logger: ModelHubLogger = ModelHubLogger.silent()
  ) {}

  /**
   * Add a provider. Registering an id again replaces the earlier provider in
   * place; the replaced one is detached but not disposed.
   */
  register(provider: LanguageModelProvider): void {
    const existing = this.providers.get(provider.id);
    if (existing) {
      existing.unsubscribe();
      this.logger.warn(`Provider ${provider.id} registered twice; replacing the earlier instance`, {
        providerId: provider.id,
      });
    }

    const unsubscribe = provider.subscribe((snapshot) => this.onProviderState(provider.id, snapshot));
    this.providers.set(provider.id, { provider, unsubscribe });

    const replaced = existing !== undefined;
    this.eventBus.emit("ProviderRegisteredEvent", { providerId: provider.id, replaced });
    this.notify({ type: "provider-registered", providerId: provider.id, replaced });
  }

  unregister(id: ProviderId | string): LanguageModelProvider | undefined {
    const registration = this.providers.get(id);
    if (!registration) return undefined;

    registration.unsubscribe();
    this.providers.delete(id);
    this.eventBus.emit("ProviderRemovedEvent", { providerId: registration.provider.id });
    this.notify({ type: "provider-removed", providerId: registration.provider.id });

    if (this.active?.providerId === registration.provider.id) {
      this.setActive(undefined);
    }
    return registration.provider;
  }

  lookup(id: ProviderId | string): LanguageModelProvider | undefined {
    return this.providers.get(id)?.provider;
  }

  list(): LanguageModelProvider[] {
    return [...this.providers.values()].map((registration) => registration.provider);
  }

  /**
   * Models of authenticated providers, in provider order then model order
   */
  availableModels(): LanguageModel[] {
    return this.list()
      .filter((provider) => provider.isAuthenticated())
      .flatMap((provider) => provider.providedModels());
  }

  selectModel(providerId: ProviderId | string, modelId: ModelId | string): LanguageModel {
    const provider = this.lookup(providerId);
    if (!provider) {
      throw new ProviderNotFoundError(providerId);
    }
    if (!provider.isAuthenticated()) {
      throw new AuthenticationRequiredError(provider.id);
    }
    const model = provider.model(modelId);
    if (!model) {
      throw new ModelNotFoundError(provider.id, modelId);
    }

    this.setActive(model);
    return model;
  }

  /**
   * The selected model as the provider currently offers it; undefined when it
   * is no longer listed
   */
  activeModel(): LanguageModel | undefined {
    if (!this.active) return undefined;
    return this.lookup(this.active.providerId)?.model(this.active.modelId);
  }

  clearActiveModel(): void {
    if (this.active) {
      this.setActive(undefined);
    }
  }

  subscribe(listener: RegistryListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Authenticate every provider concurrently. Failures are logged; returns the
   * ids that are authenticated afterwards.
   */
  async authenticateAll(): Promise<ProviderId[]> {
    const providers = this.list();
    const results = await Promise.allSettled(providers.map((provider) => provider.authenticate()));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.warn(`Authentication failed for ${providers[index].id}: ${reason}`, {
          providerId: providers[index].id,
        });
      }
    });

    return providers.filter((provider) => provider.isAuthenticated()).map((provider) => provider.id);
  }

  /**
   * Detach and dispose every registered provider
   */
  dispose(): void {
    for (const { provider, unsubscribe } of this.providers.values()) {
      unsubscribe();
      provider.dispose();
    }
    this.providers.clear();
    this.listeners.clear();
    this.active = undefined;
  }

  private setActive(model: LanguageModel | undefined): void {
    this.active = model ? { providerId: model.providerId, modelId: model.id } : undefined;
    this.eventBus.emit(
      "ActiveModelChangedEvent",
      model ? { providerId: model.providerId, modelId: model.id } : { providerId: null, modelId: null }
    );
    this.notify({ type: "active-model", model });
  }

  private onProviderState(providerId: ProviderId, snapshot: ProviderSnapshot<ModelDescriptor>): void {
    this.eventBus.emit("ProviderStateChangedEvent", {
      providerId,
      authenticated: snapshot.authenticated,
      modelCount: snapshot.models.length,
      ...(snapshot.error ? { error: snapshot.error.message } : {}),
    });
    this.notify({ type: "provider-state", providerId, snapshot });
  }

  private notify(change: RegistryChange): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error(error instanceof Error ? error : String(error), { listener: "registry" });
      }
    }
  }
}
