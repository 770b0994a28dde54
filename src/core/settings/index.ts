export * from "./schema";
export { SettingsStore, SettingsListener, parseSettings } from "./settingsStore";
export { loadSettings, LoadSettingsOptions, LoadedSettings, CONFIG_FILE_NAME } from "./loadSettings";
