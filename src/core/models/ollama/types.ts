/**
 * Ollama wire types
 */

import { z } from "zod";

export const OllamaRoleSchema = z.enum(["system", "user", "assistant"]);
export type OllamaRole = z.infer<typeof OllamaRoleSchema>;

export const ChatMessageSchema = z.object({
  role: OllamaRoleSchema,
  content: z.string(),
});
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/** Duration string such as "5m", or seconds; negative keeps the model loaded */
export type KeepAlive = string | number;

export interface ChatOptions {
  num_ctx?: number;
  stop?: string[];
  temperature?: number;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  keep_alive: KeepAlive;
  stream: boolean;
  options?: ChatOptions;
}

export const ChatResponseDeltaSchema = z.object({
  model: z.string(),
  created_at: z.string(),
  message: ChatMessageSchema,
  done: z.boolean(),
  done_reason: z.string().optional(),
});
export type ChatResponseDelta = z.infer<typeof ChatResponseDeltaSchema>;

export const ErrorResponseSchema = z.object({
  error: z.string(),
});

export const LocalModelSchema = z.object({
  name: z.string().min(1),
  modified_at: z.string().optional(),
  size: z.number().optional(),
  digest: z.string().optional(),
});
export type LocalModel = z.infer<typeof LocalModelSchema>;

export const LocalModelsResponseSchema = z.object({
  models: z.array(LocalModelSchema),
});

/**
 * Model as offered by the provider. `id` and `name` are both the full Ollama
 * name ("llama3:latest"); `displayName` drops the ":latest" tag.
 */
export interface OllamaModel {
  readonly id: string;
  readonly name: string;
  readonly displayName: string;
  readonly maxTokens: number;
}
