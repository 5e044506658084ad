/* ------------------------------ Script versions ------------------------------ */

export type ScriptVersion = "original" | "basic" | "ted" | "podcast" | "dialog";

/** Two-party formats voiced turn by turn. */
export type DialogueFormat = "podcast" | "dialog";

export type SpeakerRole = "host" | "guest" | "a" | "b";

export type InputMethod = "text" | "image" | "file";

export type TtsVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

/* ---------------------------------- Audio ---------------------------------- */

export type Turn = {
  readonly role: SpeakerRole;
  readonly text: string;
  readonly order: number; // zero-based position in the dialogue
};

export type SynthesisResult = {
  turn: Turn;
  audioFile: string;
  voice: TtsVoice;
  index: number; // position in the extracted sequence, failures included
};

export type MergeMethod = "ffmpeg" | "pcm";

export type AssembledTrack = {
  merged?: string;
  method?: MergeMethod;
  turns: SynthesisResult[];
};

/**
 * Audio as the browser and the project store see it. File references are
 * relative to the data directory (posix separators).
 */
export type TurnAudio = {
  role: SpeakerRole;
  text: string;
  order: number;
  voice: TtsVoice;
  file: string;
};

export type VersionAudio =
  | { kind: "single"; file: string; voice: TtsVoice }
  | {
      kind: "dialogue";
      merged?: string;
      mergeMethod?: MergeMethod;
      turns: TurnAudio[];
      roles: Partial<Record<SpeakerRole, string>>;
    };

/* --------------------------------- Results --------------------------------- */

export type GeneratedScript = {
  title: string;
  koreanTitle: string;
  script: string;
};

export type VersionResult = GeneratedScript & {
  translation?: string;
  audio?: VersionAudio;
};
