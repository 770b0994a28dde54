/**
 * Core type definitions for modelhub
 *
 * Identifiers are branded strings: a ModelId cannot be passed where a
 * ProviderId is expected even though both are plain strings at runtime.
 */

import { z } from "zod";
import { ValidationError } from "../errors";

export const ModelIdSchema = z.string().min(1).brand<"ModelId">();
export const ModelNameSchema = z.string().min(1).brand<"ModelName">();
export const ProviderIdSchema = z.string().min(1).brand<"ProviderId">();
export const ProviderNameSchema = z.string().min(1).brand<"ProviderName">();

export type ModelId = z.infer<typeof ModelIdSchema>;
export type ModelName = z.infer<typeof ModelNameSchema>;
export type ProviderId = z.infer<typeof ProviderIdSchema>;
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const modelId = (value: string): ModelId => ModelIdSchema.parse(value);
export const modelName = (value: string): ModelName => ModelNameSchema.parse(value);
export const providerId = (value: string): ProviderId => ProviderIdSchema.parse(value);
export const providerName = (value: string): ProviderName => ProviderNameSchema.parse(value);

/**
 * Code-unit ordering, identical for every identifier kind.
 */
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export const RoleSchema = z.enum(["system", "user", "assistant"]);
export type Role = z.infer<typeof RoleSchema>;

export const LanguageModelRequestMessageSchema = z.object({
  role: RoleSchema,
  content: z.string(),
});

export type LanguageModelRequestMessage = z.infer<typeof LanguageModelRequestMessageSchema>;

export const LanguageModelRequestSchema = z.object({
  messages: z.array(LanguageModelRequestMessageSchema),
  stop: z.array(z.string()).default([]),
  temperature: z.number().finite().default(1),
});

export type LanguageModelRequest = z.output<typeof LanguageModelRequestSchema>;
export type LanguageModelRequestInput = z.input<typeof LanguageModelRequestSchema>;

/**
 * Build a request, filling in `stop` and `temperature` defaults
 */
export function createRequest(input: LanguageModelRequestInput): LanguageModelRequest {
  return validateRequest(input);
}

export function validateRequest(input: unknown): LanguageModelRequest {
  const parsed = LanguageModelRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("invalid language model request", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}
