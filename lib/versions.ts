import type { DialogueFormat, ScriptVersion, SpeakerRole, TtsVoice } from "./types";

export const SCRIPT_VERSIONS: ScriptVersion[] = ["original", "basic", "ted", "podcast", "dialog"];

export const VERSION_LABELS: Record<ScriptVersion, string> = {
  original: "Original script",
  basic: "Basic speaking",
  ted: "TED 3-minute talk",
  podcast: "Podcast dialogue",
  dialog: "Daily dialogue",
};

export const DIALOGUE_ROLES: Record<DialogueFormat, readonly [SpeakerRole, SpeakerRole]> = {
  podcast: ["host", "guest"],
  dialog: ["a", "b"],
};

export const ROLE_LABELS: Record<SpeakerRole, string> = {
  host: "Host",
  guest: "Guest",
  a: "Person A",
  b: "Person B",
};

export function isDialogueVersion(version: ScriptVersion): version is DialogueFormat {
  return version === "podcast" || version === "dialog";
}

export const TTS_VOICES: Array<{ id: TtsVoice; label: string }> = [
  { id: "alloy", label: "Alloy (neutral, balanced)" },
  { id: "echo", label: "Echo (male, clear)" },
  { id: "fable", label: "Fable (male, British accent)" },
  { id: "onyx", label: "Onyx (male, deep)" },
  { id: "nova", label: "Nova (female, soft)" },
  { id: "shimmer", label: "Shimmer (female, warm)" },
];

export const CHAT_MODELS = ["gpt-4o-mini", "gpt-4o", "gpt-4-turbo", "gpt-3.5-turbo"] as const;

export const CATEGORIES = [
  "General",
  "Business",
  "Travel",
  "Education",
  "Health",
  "Technology",
  "Culture",
  "Sports",
] as const;

export type Category = (typeof CATEGORIES)[number];

export type VoicePair = { voice1: TtsVoice; voice2: TtsVoice };

export const DEFAULT_VOICES: VoicePair = { voice1: "alloy", voice2: "nova" };

/** Voice 1 speaks host/A turns and single-voice versions except TED. */
export function voiceForRole(role: SpeakerRole, voices: VoicePair): TtsVoice {
  return role === "host" || role === "a" ? voices.voice1 : voices.voice2;
}

export function voiceForSingleVersion(version: ScriptVersion, voices: VoicePair): TtsVoice {
  return version === "ted" ? voices.voice2 : voices.voice1;
}

/* File names inside a project folder. */

export function scriptFileName(version: ScriptVersion) {
  return version === "original" ? "original_script.txt" : `${version}_script.txt`;
}

export function translationFileName(version: ScriptVersion) {
  return version === "original" ? "korean_translation.txt" : `${version}_korean_translation.txt`;
}
