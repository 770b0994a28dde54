/**
 * In-memory settings store with change notification.
 *
 * Every update is validated as a whole and swapped in atomically; listeners
 * only ever observe complete, frozen settings objects.
 */

import { ZodError } from "zod";
import { EventBus, Unsubscribe } from "../eventBus";
import { HostShutdownError, ValidationError } from "../errors";
import { ModelHubLogger } from "../logger";
import {
  LanguageModelSettings,
  LanguageModelSettingsInput,
  LanguageModelSettingsSchema,
  SettingsPatch,
  SettingsSection,
} from "./schema";

export type SettingsListener = (
  settings: LanguageModelSettings,
  changed: SettingsSection[],
  previous: LanguageModelSettings
) => void;

const SECTIONS: readonly SettingsSection[] = ["ollama", "logger"];

export function parseSettings(input: unknown): LanguageModelSettings {
  try {
    const parsed = LanguageModelSettingsSchema.parse(input);
    return Object.freeze({
      ollama: Object.freeze(parsed.ollama),
      logger: Object.freeze(parsed.logger),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError("invalid settings", {
        issues: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    throw error;
  }
}

export class SettingsStore {
  private current: LanguageModelSettings;
  private readonly listeners = new Set<SettingsListener>();
  private disposed = false;

  constructor(
    initial: LanguageModelSettingsInput = {},
    private readonly eventBus?: EventBus,
    private readonly logger: ModelHubLogger = ModelHubLogger.silent()
  ) {
    this.current = parseSettings(initial);
  }

  /**
   * Current settings. Throws HostShutdownError once the store is disposed.
   */
  get(): LanguageModelSettings {
    if (this.disposed) {
      throw new HostShutdownError();
    }
    return this.current;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Merge a patch section by section, validate and notify. Returns the
   * settings in effect afterwards; no notification when nothing changed.
   */
  update(patch: SettingsPatch): LanguageModelSettings {
    const previous = this.get();
    const next = parseSettings({
      ollama: { ...previous.ollama, ...patch.ollama },
      logger: { ...previous.logger, ...patch.logger },
    });

    const changed = SECTIONS.filter(
      (section) => JSON.stringify(previous[section]) !== JSON.stringify(next[section])
    );
    if (changed.length === 0) {
      return previous;
    }

    this.current = next;
    this.eventBus?.emit("SettingsChangedEvent", { keys: changed });

    for (const listener of [...this.listeners]) {
      try {
        listener(next, changed, previous);
      } catch (error) {
        this.logger.error(error instanceof Error ? error : String(error), { listener: "settings" });
      }
    }
    return next;
  }

  subscribe(listener: SettingsListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }
}
