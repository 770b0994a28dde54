/**
 * Load settings from modelhub.config.json and the environment
 */

import fs from "fs";
import path from "path";
import { LanguageModelSettingsInput, LanguageModelSettingsSchema } from "./schema";
import { parseLogFormat, parseLogLevel } from "../logger/config";

export const CONFIG_FILE_NAME = "modelhub.config.json";

export interface LoadSettingsOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedSettings {
  settings: LanguageModelSettingsInput;
  source: string | null;
  warnings: string[];
}

function readConfigFile(configPath: string, warnings: string[]): LanguageModelSettingsInput {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    warnings.push(`Could not parse ${configPath}: ${reason}; using defaults`);
    return {};
  }

  const parsed = LanguageModelSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    warnings.push(`Invalid settings in ${configPath} (${issues.join(", ")}); using defaults`);
    return {};
  }
  return parsed.data;
}

function parsePositiveInt(value: string | undefined, name: string, warnings: string[]): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    warnings.push(`Ignoring ${name}=${value}: expected a positive integer`);
    return undefined;
  }
  return parsed;
}

/**
 * File values first, then environment overrides:
 * OLLAMA_URL, OLLAMA_LOW_SPEED_TIMEOUT_MS, OLLAMA_MAX_CONCURRENT_REQUESTS,
 * LOG_LEVEL, LOG_FORMAT, LOG_FILE_PATH.
 */
export function loadSettings(options: LoadSettingsOptions = {}): LoadedSettings {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
  const warnings: string[] = [];

  const fromFile = readConfigFile(configPath, warnings);
  const ollama = { ...fromFile.ollama };
  const logger = { ...fromFile.logger };

  if (env.OLLAMA_URL) {
    ollama.apiUrl = env.OLLAMA_URL;
  }
  const lowSpeedTimeoutMs = parsePositiveInt(env.OLLAMA_LOW_SPEED_TIMEOUT_MS, "OLLAMA_LOW_SPEED_TIMEOUT_MS", warnings);
  if (lowSpeedTimeoutMs !== undefined) {
    ollama.lowSpeedTimeoutMs = lowSpeedTimeoutMs;
  }
  const maxConcurrentRequests = parsePositiveInt(
    env.OLLAMA_MAX_CONCURRENT_REQUESTS,
    "OLLAMA_MAX_CONCURRENT_REQUESTS",
    warnings
  );
  if (maxConcurrentRequests !== undefined) {
    ollama.maxConcurrentRequests = maxConcurrentRequests;
  }

  if (env.LOG_LEVEL) {
    logger.level = parseLogLevel(env.LOG_LEVEL);
  }
  if (env.LOG_FORMAT) {
    logger.format = parseLogFormat(env.LOG_FORMAT);
  }
  if (env.LOG_FILE_PATH) {
    logger.file = { enabled: true, path: env.LOG_FILE_PATH };
  }

  return {
    settings: { ollama, logger },
    source: fs.existsSync(configPath) ? configPath : null,
    warnings,
  };
}
