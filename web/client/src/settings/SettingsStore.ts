import { describeError } from "../errors";
import { Logger } from "../logger";
import type { PanelId } from "../types";

const log = Logger.getLogger("settings");

export interface ViewerSettings {
  defaultDirectory: string | null;
  panels: Record<PanelId, boolean>;
}

export const DEFAULT_SETTINGS: Readonly<ViewerSettings> = {
  defaultDirectory: null,
  panels: { navigation: false, metadata: false },
};

export interface SettingsStore {
  load(): Promise<ViewerSettings>;
  save(settings: ViewerSettings): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads whatever was persisted, falling back to defaults field by field. */
export function parseSettings(raw: unknown): ViewerSettings {
  const settings: ViewerSettings = {
    defaultDirectory: DEFAULT_SETTINGS.defaultDirectory,
    panels: { ...DEFAULT_SETTINGS.panels },
  };
  if (!isRecord(raw)) {
    return settings;
  }
  if (typeof raw.defaultDirectory === "string" && raw.defaultDirectory.length > 0) {
    settings.defaultDirectory = raw.defaultDirectory;
  }
  const panels = raw.panels;
  if (isRecord(panels)) {
    if (typeof panels.navigation === "boolean") settings.panels.navigation = panels.navigation;
    if (typeof panels.metadata === "boolean") settings.panels.metadata = panels.metadata;
  }
  return settings;
}

function copySettings(settings: ViewerSettings): ViewerSettings {
  return { defaultDirectory: settings.defaultDirectory, panels: { ...settings.panels } };
}

export class MemorySettingsStore implements SettingsStore {
  private stored: ViewerSettings;
  saves = 0;

  constructor(initial: Partial<ViewerSettings> = {}) {
    this.stored = parseSettings({ ...DEFAULT_SETTINGS, ...initial });
  }

  async load(): Promise<ViewerSettings> {
    return copySettings(this.stored);
  }

  async save(settings: ViewerSettings): Promise<void> {
    this.stored = copySettings(settings);
    this.saves += 1;
  }
}

export type KeyValueStorage = Pick<Storage, "getItem" | "setItem">;

export class LocalStorageSettingsStore implements SettingsStore {
  private storage: KeyValueStorage;
  private key: string;

  constructor(storage: KeyValueStorage, key = "viewer.settings") {
    this.storage = storage;
    this.key = key;
  }

  async load(): Promise<ViewerSettings> {
    const text = this.storage.getItem(this.key);
    if (text === null) {
      return parseSettings(null);
    }
    try {
      return parseSettings(JSON.parse(text));
    } catch (error) {
      log.warn(`ignoring unreadable settings: ${describeError(error)}`);
      return parseSettings(null);
    }
  }

  async save(settings: ViewerSettings): Promise<void> {
    this.storage.setItem(this.key, JSON.stringify(settings));
  }
}
