import { z } from "zod";
import { CHAT_MODELS } from "./versions";

export const ScriptVersionSchema = z.enum(["original", "basic", "ted", "podcast", "dialog"]);
export const SpeakerRoleSchema = z.enum(["host", "guest", "a", "b"]);
export const TtsVoiceSchema = z.enum(["alloy", "echo", "fable", "onyx", "nova", "shimmer"]);
export const InputMethodSchema = z.enum(["text", "image", "file"]);
export const ChatModelSchema = z.enum(CHAT_MODELS);

/* ---------------------------------- Audio ---------------------------------- */

const FileRef = z.string().min(1);

export const TurnAudioSchema = z.object({
  role: SpeakerRoleSchema,
  text: z.string(),
  order: z.number().int().min(0),
  voice: TtsVoiceSchema,
  file: FileRef,
});

export const VersionAudioSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("single"), file: FileRef, voice: TtsVoiceSchema }),
  z.object({
    kind: z.literal("dialogue"),
    merged: FileRef.optional(),
    mergeMethod: z.enum(["ffmpeg", "pcm"]).optional(),
    turns: z.array(TurnAudioSchema),
    roles: z.record(SpeakerRoleSchema, FileRef),
  }),
]);

export const VersionResultSchema = z.object({
  title: z.string().trim().min(1),
  koreanTitle: z.string(),
  script: z.string().min(1),
  translation: z.string().optional(),
  audio: VersionAudioSchema.optional(),
});

/* --------------------------------- Projects -------------------------------- */

export const SavedVersionSchema = z.object({
  title: z.string(),
  koreanTitle: z.string().optional(),
  script: FileRef.optional(),
  translation: FileRef.optional(),
  audio: VersionAudioSchema.optional(),
});

export const ProjectMetadataSchema = z.object({
  projectId: z.string().min(1),
  title: z.string(),
  koreanTitle: z.string().optional(),
  category: z.string(),
  inputMethod: InputMethodSchema,
  inputContent: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  versions: z.array(ScriptVersionSchema),
  files: z.record(ScriptVersionSchema, SavedVersionSchema).default({}),
});

export const ProjectIndexEntrySchema = z.object({
  projectId: z.string().min(1),
  title: z.string(),
  category: z.string(),
  projectPath: FileRef,
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const ProjectIndexSchema = z.object({
  projects: z.array(ProjectIndexEntrySchema).default([]),
});

export type SavedVersion = z.infer<typeof SavedVersionSchema>;
export type ProjectMetadata = z.infer<typeof ProjectMetadataSchema>;
export type ProjectIndexEntry = z.infer<typeof ProjectIndexEntrySchema>;
export type ProjectIndex = z.infer<typeof ProjectIndexSchema>;
