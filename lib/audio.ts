import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { assembleTrack } from "./dialogue/assembler";
import { synthesizeTurns, type SpeakFn } from "./dialogue/synthesizer";
import { extractTurns, groupByRole } from "./dialogue/turns";
import { StudioError } from "./errors";
import type { TrackConcatenator } from "./media/concat";
import { draftDir, toDataRelative } from "./projects/paths";
import { cleanSpeechText } from "./text";
import type { ScriptVersion, SpeakerRole, TurnAudio, VersionAudio } from "./types";
import { isDialogueVersion, voiceForSingleVersion, type VoicePair } from "./versions";

export type VersionAudioOptions = {
  voices: VoicePair;
  speak: SpeakFn;
  dataDir: string;
  draftId: string;
  concatenators: {
    primary?: TrackConcatenator;
    fallback?: TrackConcatenator;
  };
};

/**
 * Voice one script version into its draft folder. Monologues become one
 * clip; dialogues are voiced per turn and merged when possible.
 */
export async function generateVersionAudio(
  version: ScriptVersion,
  script: string,
  opts: VersionAudioOptions
): Promise<VersionAudio> {
  const outDir = draftDir(opts.dataDir, opts.draftId, version);
  // a new take replaces the previous draft of this version
  await rm(outDir, { recursive: true, force: true });
  await mkdir(outDir, { recursive: true });

  const rel = (file: string) => toDataRelative(opts.dataDir, file);

  if (!isDialogueVersion(version)) {
    const text = cleanSpeechText(script);
    if (!text) {
      throw new StudioError("Nothing left to speak after cleaning the script.", 422, "empty_script");
    }
    const voice = voiceForSingleVersion(version, opts.voices);
    console.info(`[audio] ${version}: single voice ${voice}, ${text.length} chars`);

    const file = path.join(outDir, `${version}_audio.mp3`);
    await writeFile(file, await opts.speak(text, voice));
    return { kind: "single", file: rel(file), voice };
  }

  const turns = extractTurns(script, version);
  if (turns.length === 0) {
    throw new StudioError("No dialogue lines found in the script.", 422, "empty_script");
  }
  const perRole = Object.entries(groupByRole(turns))
    .map(([role, text = ""]) => `${role} ${text.length} chars`)
    .join(", ");
  console.info(`[audio] ${version}: ${turns.length} turns (${perRole})`);

  const results = await synthesizeTurns(turns, {
    voices: opts.voices,
    speak: opts.speak,
    outDir: path.join(outDir, "turns"),
    onProgress: ({ index, total, ok }) => {
      if (ok) console.info(`[audio] turn ${index + 1}/${total} voiced`);
    },
  });
  if (results.length === 0) {
    throw new StudioError("Speech synthesis failed for every turn.", 502, "tts_failed");
  }

  const track = await assembleTrack(results, {
    outDir,
    stem: `${version}_merged_dialogue`,
    ...opts.concatenators,
  });

  const turnAudio: TurnAudio[] = track.turns.map((r) => ({
    role: r.turn.role,
    text: r.turn.text,
    order: r.turn.order,
    voice: r.voice,
    file: rel(r.audioFile),
  }));

  const roles: Partial<Record<SpeakerRole, string>> = {};
  for (const t of turnAudio) roles[t.role] ??= t.file;

  return {
    kind: "dialogue",
    merged: track.merged ? rel(track.merged) : undefined,
    mergeMethod: track.method,
    turns: turnAudio,
    roles,
  };
}
