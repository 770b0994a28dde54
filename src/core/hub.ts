/**
 * Bootstrap: wires events, logging, settings, transport, providers and the
 * registry into one context object owned by the host application.
 */

import { EventBus } from "./eventBus";
import { FetchHttpClient, HttpClient } from "./http";
import { ModelHubLogger } from "./logger";
import { LanguageModelProvider, LanguageModelRegistry, ProviderContext, createOllamaProvider } from "./models";
import { LanguageModelSettingsInput, parseSettings, SettingsStore } from "./settings";

export type ProviderFactory = (context: ProviderContext, http: HttpClient) => LanguageModelProvider;

export interface ModelHubOptions {
  settings?: LanguageModelSettingsInput;
  eventBus?: EventBus;
  /** Defaults to a logger built from the `logger` settings section */
  logger?: ModelHubLogger;
  http?: HttpClient;
  /** Defaults to the Ollama provider alone */
  providers?: ProviderFactory[];
}

export interface ModelHub {
  readonly eventBus: EventBus;
  readonly logger: ModelHubLogger;
  readonly settings: SettingsStore;
  readonly http: HttpClient;
  readonly registry: LanguageModelRegistry;
  /** Dispose providers, then settings; later completion calls fail with HostShutdownError */
  dispose(): Promise<void>;
}

export function createModelHub(options: ModelHubOptions = {}): ModelHub {
  const eventBus = options.eventBus ?? new EventBus();
  const initial = parseSettings(options.settings ?? {});
  const ownsLogger = options.logger === undefined;
  const logger =
    options.logger ??
    new ModelHubLogger(eventBus, {
      level: initial.logger.level,
      format: initial.logger.format,
      file: initial.logger.file,
      source: "modelhub",
    });

  const settings = new SettingsStore(initial, eventBus, logger.child({ component: "settings" }));
  const http = options.http ?? new FetchHttpClient();
  const registry = new LanguageModelRegistry(eventBus, logger.child({ component: "registry" }));

  const context: ProviderContext = { eventBus, logger, settings };
  for (const factory of options.providers ?? [createOllamaProvider]) {
    registry.register(factory(context, http));
  }
  logger.debug("Model hub ready", { providers: registry.list().map((provider) => provider.id) });

  let disposed = false;
  return {
    eventBus,
    logger,
    settings,
    http,
    registry,
    async dispose() {
      if (disposed) return;
      disposed = true;
      registry.dispose();
      settings.dispose();
      if (ownsLogger) {
        logger.dispose();
        await logger.flush();
      }
    },
  };
}
