export {
  LanguageModel,
  BaseLanguageModel,
  LanguageModelContext,
  CompletionStream,
  CompletionOperation,
  CallOptions,
  estimateTokenCount,
  collectCompletion,
} from "./languageModel";
export {
  LanguageModelProvider,
  BaseLanguageModelProvider,
  ConfigurationView,
  ProviderContext,
  ProviderLimits,
  ProviderListener,
} from "./provider";
export {
  ProviderState,
  ProviderSnapshot,
  ModelDescriptor,
  RefreshStrategy,
  Probe,
  SnapshotListener,
  createSnapshot,
} from "./providerState";
export { RateLimiter, LimitedStream, Permit } from "./rateLimiter";
export { LanguageModelRegistry, RegistryChange, RegistryListener } from "./registry";
export { useTool, toolJsonSchema, validateToolOutput, JsonSchema, LanguageModelTool } from "./tool";
export {
  MockLanguageModelProvider,
  MockModelScript,
  MockProviderOptions,
  MockCallCounts,
  DEFAULT_MOCK_MODELS,
  createMockProvider,
} from "./mockProvider";
export * from "./ollama";
