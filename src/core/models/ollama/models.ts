/**
 * Model naming and context window defaults for Ollama models
 */

import { OllamaModel } from "./types";

const DEFAULT_CONTEXT_WINDOW = 2048;
// Larger windows make Ollama allocate more memory than most machines have
const MAX_CONTEXT_WINDOW = 16384;

const CONTEXT_WINDOWS = new Map<string, number>([
  ["phi", 2048],
  ["tinyllama", 2048],
  ["granite-code", 2048],
  ["llama2", 4096],
  ["yi", 4096],
  ["vicuna", 4096],
  ["stablelm2", 4096],
  ["llama3", 8192],
  ["gemma2", 8192],
  ["gemma", 8192],
  ["codegemma", 8192],
  ["starcoder", 8192],
  ["aya", 8192],
  ["codellama", 16384],
  ["starcoder2", 16384],
  ["mistral", 32768],
  ["codestral", 32768],
  ["mixstral", 32768],
  ["llava", 32768],
  ["qwen2", 32768],
  ["dolphin-mixtral", 32768],
  ["llama3.1", 128000],
  ["phi3", 128000],
  ["phi3.5", 128000],
  ["command-r", 128000],
  ["deepseek-coder-v2", 128000],
]);

/**
 * Context window for a model name, looked up by family ("llama3" for
 * "llama3:8b") and clamped to [1, 16384]
 */
export function getMaxTokens(name: string): number {
  const family = name.split(":")[0];
  const tokens = CONTEXT_WINDOWS.get(family) ?? DEFAULT_CONTEXT_WINDOW;
  return Math.min(Math.max(tokens, 1), MAX_CONTEXT_WINDOW);
}

export function getDisplayName(name: string): string {
  return name.endsWith(":latest") ? name.slice(0, -":latest".length) : name;
}

export function isEmbeddingModel(name: string): boolean {
  return name.includes("-embed");
}

export function createOllamaModel(name: string): OllamaModel {
  return Object.freeze({
    id: name,
    name,
    displayName: getDisplayName(name),
    maxTokens: getMaxTokens(name),
  });
}
