/**
 * Settings schema for providers and the ambient stack
 */

import { z } from "zod";

export const DEFAULT_OLLAMA_API_URL = "http://localhost:11434";

export const OllamaSettingsSchema = z.object({
  apiUrl: z.string().url().default(DEFAULT_OLLAMA_API_URL),
  // Abort a streaming call when no bytes arrive within this window
  lowSpeedTimeoutMs: z.number().int().positive().optional(),
  maxConcurrentRequests: z.number().int().positive().default(4),
  // Ollama accepts a duration string ("5m") or seconds; -1 keeps the model loaded
  keepAlive: z.union([z.string().min(1), z.number().int()]).default(-1),
  refreshStrategy: z.enum(["coalesce", "race"]).default("coalesce"),
});

export const LoggerSettingsSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  format: z.enum(["json", "pretty"]).default("pretty"),
  file: z
    .object({
      enabled: z.boolean().default(false),
      path: z.string().min(1).default("./logs/modelhub.log"),
    })
    .optional(),
});

export const LanguageModelSettingsSchema = z.object({
  ollama: OllamaSettingsSchema.default({}),
  logger: LoggerSettingsSchema.default({}),
});

export type OllamaSettings = z.output<typeof OllamaSettingsSchema>;
export type LoggerSettings = z.output<typeof LoggerSettingsSchema>;
export type LanguageModelSettings = z.output<typeof LanguageModelSettingsSchema>;
export type LanguageModelSettingsInput = z.input<typeof LanguageModelSettingsSchema>;

export type SettingsSection = keyof LanguageModelSettings;

export interface SettingsPatch {
  ollama?: Partial<z.input<typeof OllamaSettingsSchema>>;
  logger?: Partial<z.input<typeof LoggerSettingsSchema>>;
}
