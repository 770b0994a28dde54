/**
 * Hub construction shared by CLI commands
 */

import { createModelHub, ModelHub, ModelHubOptions, ProviderFactory } from "../../core/hub";
import { createMockProvider, createOllamaProvider } from "../../core/models";
import { loadSettings } from "../../core/settings";

export type ProviderSelection = "ollama" | "mock" | "all";

export interface CliHubOptions {
  provider?: string;
  config?: string;
  env?: NodeJS.ProcessEnv;
  /** Overrides for tests */
  hub?: Omit<ModelHubOptions, "settings" | "providers">;
}

export function parseProviderSelection(value: string | undefined): ProviderSelection {
  if (value === undefined || value === "") return "ollama";
  if (value === "ollama" || value === "mock" || value === "all") return value;
  throw new Error(`Unknown provider "${value}" (expected ollama, mock or all)`);
}

export function providerFactories(selection: ProviderSelection): ProviderFactory[] {
  const mock: ProviderFactory = (context) => createMockProvider(context);
  switch (selection) {
    case "ollama":
      return [createOllamaProvider];
    case "mock":
      return [mock];
    case "all":
      return [createOllamaProvider, mock];
  }
}

export function openHub(options: CliHubOptions = {}): ModelHub {
  const env = options.env ?? process.env;
  const loaded = loadSettings({ configPath: options.config, env });
  for (const warning of loaded.warnings) {
    console.error(`warning: ${warning}`);
  }

  return createModelHub({
    ...options.hub,
    settings: loaded.settings,
    providers: providerFactories(parseProviderSelection(options.provider ?? env.MODELHUB_PROVIDER)),
  });
}

/**
 * Run `action` against a fresh hub and dispose it afterwards
 */
export async function withHub<T>(options: CliHubOptions, action: (hub: ModelHub) => Promise<T>): Promise<T> {
  const hub = openHub(options);
  try {
    return await action(hub);
  } finally {
    await hub.dispose();
  }
}
