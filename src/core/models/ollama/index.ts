export * from "./types";
export { OllamaClient, OllamaRequestOptions } from "./OllamaClient";
export { OllamaLanguageModel } from "./OllamaAdapter";
export {
  OllamaLanguageModelProvider,
  createOllamaProvider,
  OLLAMA_PROVIDER_ID,
  OLLAMA_PROVIDER_NAME,
  OLLAMA_DOWNLOAD_URL,
  OLLAMA_LIBRARY_URL,
} from "./OllamaProvider";
export { createOllamaModel, getDisplayName, getMaxTokens, isEmbeddingModel } from "./models";
