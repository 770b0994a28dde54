/**
 * LanguageModelProvider contract and shared provider plumbing
 */

import { EventBus, Unsubscribe } from "../eventBus";
import { AuthenticationRequiredError } from "../errors";
import { ModelHubLogger } from "../logger";
import { LanguageModelSettings, SettingsSection, SettingsStore } from "../settings";
import { ModelId, ProviderId, ProviderName } from "../types";
import { isOk } from "../utils/result";
import { LanguageModel } from "./languageModel";
import { ModelDescriptor, ProviderSnapshot, ProviderState, RefreshStrategy } from "./providerState";
import { RateLimiter } from "./rateLimiter";

/**
 * Opaque handle a host UI may render. The core never interprets it.
 */
export interface ConfigurationView {
  readonly providerId: ProviderId;
  readonly authenticated: boolean;
  readonly title: string;
  readonly description: string;
  readonly links: ReadonlyArray<{ label: string; url: string }>;
  /** Re-probe the backend, e.g. from a "Retry" button */
  retry(): Promise<void>;
}

export type ProviderListener = (snapshot: ProviderSnapshot<ModelDescriptor>) => void;

export interface LanguageModelProvider {
  readonly id: ProviderId;
  readonly name: ProviderName;

  /** Models of the current snapshot, sorted by name */
  providedModels(): LanguageModel[];
  model(id: ModelId | string): LanguageModel | undefined;
  isAuthenticated(): boolean;
  /** No-op when authenticated; otherwise probes and rejects when that fails */
  authenticate(): Promise<void>;
  /** Best-effort warm-up; resolves false on failure, never rejects */
  loadModel(model: LanguageModel): Promise<boolean>;
  /** Fresh probe superseding any probe in flight */
  resetCredentials(): Promise<void>;
  configurationView(): ConfigurationView;
  state(): ProviderSnapshot<ModelDescriptor>;
  subscribe(listener: ProviderListener): Unsubscribe;
  dispose(): void;
}

export interface ProviderContext {
  eventBus: EventBus;
  logger: ModelHubLogger;
  settings: SettingsStore;
}

export interface ProviderLimits {
  maxConcurrentRequests: number;
  refreshStrategy: RefreshStrategy;
}

export abstract class BaseLanguageModelProvider<D extends ModelDescriptor> implements LanguageModelProvider {
  protected readonly logger: ModelHubLogger;
  protected readonly models: ProviderState<D>;
  private readonly limiters = new Map<string, RateLimiter>();
  private unsubscribeSettings?: Unsubscribe;

  protected constructor(
    readonly id: ProviderId,
    readonly name: ProviderName,
    protected readonly context: ProviderContext,
    private readonly settingsSection?: SettingsSection
  ) {
    this.logger = context.logger.child({ providerId: id });
    this.models = new ProviderState<D>(() => this.probe(), {
      strategy: () => this.limits(context.settings.get()).refreshStrategy,
      logger: this.logger,
    });
  }

  /** List the backend's models */
  protected abstract probe(): Promise<readonly D[]>;
  protected abstract createModel(descriptor: D, limiter: RateLimiter): LanguageModel;
  protected abstract warmUp(descriptor: D): Promise<void>;
  protected abstract limits(settings: LanguageModelSettings): ProviderLimits;
  abstract configurationView(): ConfigurationView;

  /** Forget stored credentials before `resetCredentials` re-probes */
  protected async clearCredentials(): Promise<void> {}

  /**
   * Subscribe to settings and run the first probe. Called once the subclass
   * is fully constructed.
   */
  protected start(): void {
    const section = this.settingsSection;
    if (section) {
      this.unsubscribeSettings = this.context.settings.subscribe((_settings, changed) => {
        if (!changed.includes(section)) return;
        // New capacities apply to models looked up from now on
        this.limiters.clear();
        this.refreshInBackground("settings changed");
      });
    }
    this.refreshInBackground("startup");
  }

  providedModels(): LanguageModel[] {
    return this.models.snapshot.models.map((descriptor) => this.toModel(descriptor));
  }

  model(id: ModelId | string): LanguageModel | undefined {
    const descriptor = this.models.snapshot.models.find((candidate) => candidate.id === id);
    return descriptor ? this.toModel(descriptor) : undefined;
  }

  isAuthenticated(): boolean {
    return this.models.snapshot.authenticated;
  }

  async authenticate(): Promise<void> {
    if (this.isAuthenticated()) return;

    const snapshot = await this.models.refresh();
    if (!snapshot.authenticated) {
      throw new AuthenticationRequiredError(this.id);
    }
  }

  async loadModel(model: LanguageModel): Promise<boolean> {
    const descriptor = this.models.snapshot.models.find((candidate) => candidate.id === model.id);
    const stopTimer = this.logger.startTimer("loadModel", { modelId: model.id });
    try {
      if (model.providerId !== this.id || !descriptor) {
        throw new Error(`Model ${model.id} is not provided by ${this.id}`);
      }
      await this.warmUp(descriptor);
      stopTimer();
      this.context.eventBus.emit("ModelLoadEvent", { providerId: this.id, modelId: model.id, success: true });
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to load model ${model.id}: ${message}`, { modelId: model.id });
      this.context.eventBus.emit("ModelLoadEvent", {
        providerId: this.id,
        modelId: model.id,
        success: false,
        error: message,
      });
      return false;
    }
  }

  async resetCredentials(): Promise<void> {
    await this.clearCredentials();
    try {
      await this.models.reset();
    } catch (error) {
      // The snapshot now carries the error; callers read it through state()
      this.logger.warn(`Probe after credential reset failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  state(): ProviderSnapshot<D> {
    return this.models.snapshot;
  }

  subscribe(listener: ProviderListener): Unsubscribe {
    return this.models.subscribe((snapshot) => listener(snapshot));
  }

  dispose(): void {
    this.unsubscribeSettings?.();
    this.unsubscribeSettings = undefined;
    this.models.dispose();
    this.limiters.clear();
  }

  /**
   * One limiter per model id, shared by every instance of that model
   */
  protected limiterFor(modelId: string): RateLimiter {
    let limiter = this.limiters.get(modelId);
    if (!limiter) {
      limiter = new RateLimiter(this.limits(this.context.settings.get()).maxConcurrentRequests, this.logger);
      this.limiters.set(modelId, limiter);
    }
    return limiter;
  }

  private toModel(descriptor: D): LanguageModel {
    return this.createModel(descriptor, this.limiterFor(descriptor.id));
  }

  private refreshInBackground(reason: string): void {
    void this.models.refreshSettled().then((result) => {
      if (isOk(result)) {
        this.logger.debug(`Refreshed models (${reason})`, { modelCount: result.value.models.length });
      } else {
        this.logger.warn(`Model refresh failed (${reason}): ${result.error.message}`);
      }
    });
  }
}
