/**
 * modelhub public API
 */

export { createModelHub, ModelHub, ModelHubOptions, ProviderFactory } from "./core/hub";
export * from "./core/models";
export * from "./core/errors";
export * from "./core/types";
export { Result, ok, err, isOk } from "./core/utils/result";
export { EventBus, EventEnvelope, EventPayloads, EventType, Listener, Unsubscribe } from "./core/eventBus";
export {
  ModelHubLogger,
  LoggerContext,
  initializeLogger,
  getLogger,
  createContextualLogger,
} from "./core/logger";
export * from "./core/settings";
export * from "./core/http";
export { Credential, CredentialStore, InMemoryCredentialStore } from "./core/credentials";
