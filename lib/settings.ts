import { z } from "zod";
import { ChatModelSchema, TtsVoiceSchema } from "./schemas";
import { DEFAULT_VOICES } from "./versions";

const STORAGE_KEY = "talk-studio:settings";
export const SETTINGS_EVENT = "settings-changed";

const SettingsSchema = z.object({
  apiKey: z.string().catch(""),
  model: ChatModelSchema.catch("gpt-4o-mini"),
  voice1: TtsVoiceSchema.catch(DEFAULT_VOICES.voice1),
  voice2: TtsVoiceSchema.catch(DEFAULT_VOICES.voice2),
});

export type AppSettings = z.infer<typeof SettingsSchema>;

export const defaultSettings: AppSettings = {
  apiKey: "",
  model: "gpt-4o-mini",
  voice1: DEFAULT_VOICES.voice1,
  voice2: DEFAULT_VOICES.voice2,
};

/** Unknown or broken fields fall back to their defaults one by one. */
export function parseSettings(stored: string | null): AppSettings {
  if (!stored) return defaultSettings;
  let raw: unknown;
  try {
    raw = JSON.parse(stored);
  } catch (e) {
    console.error("Failed to parse settings", e);
    return defaultSettings;
  }
  const parsed = SettingsSchema.safeParse(raw);
  return parsed.success ? parsed.data : defaultSettings;
}

export function getSettings(): AppSettings {
  if (typeof window === "undefined") return defaultSettings;
  return parseSettings(window.localStorage.getItem(STORAGE_KEY));
}

export function saveSettings(settings: AppSettings) {
  window.localStorage.setItem(STORAGE_KEY, JSON.stringify(settings));
  window.dispatchEvent(new Event(SETTINGS_EVENT));
}
