import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors";
import type { SynthesisResult, Turn, TtsVoice } from "../types";
import { voiceForRole, type VoicePair } from "../versions";

export type SpeakFn = (text: string, voice: TtsVoice) => Promise<Buffer>;

export type SynthesizeTurnsOptions = {
  voices: VoicePair;
  speak: SpeakFn;
  outDir: string;
  /** Calls per turn before it is skipped. */
  attempts?: number;
  onProgress?: (info: { index: number; total: number; turn: Turn; ok: boolean }) => void;
};

export function turnFileName(index: number, turn: Turn, voice: TtsVoice) {
  return `${String(index + 1).padStart(2, "0")}_${turn.role}_${voice}.mp3`;
}

/**
 * Voice each turn in order, one call at a time. A turn that keeps failing is
 * skipped; the returned list holds the turns that produced audio.
 */
export async function synthesizeTurns(
  turns: readonly Turn[],
  opts: SynthesizeTurnsOptions
): Promise<SynthesisResult[]> {
  await mkdir(opts.outDir, { recursive: true });

  const attempts = Math.max(1, opts.attempts ?? 2);
  const total = turns.length;
  const results: SynthesisResult[] = [];

  for (const [index, turn] of turns.entries()) {
    if (!turn.text.trim()) {
      console.warn(`[audio] turn ${index + 1}/${total} (${turn.role}) is empty, skipping`);
      opts.onProgress?.({ index, total, turn, ok: false });
      continue;
    }

    const voice = voiceForRole(turn.role, opts.voices);
    const audioFile = path.join(opts.outDir, turnFileName(index, turn, voice));
    let ok = false;

    for (let attempt = 1; attempt <= attempts && !ok; attempt++) {
      try {
        const audio = await opts.speak(turn.text, voice);
        if (audio.length === 0) throw new Error("empty audio payload");
        await writeFile(audioFile, audio);
        ok = true;
      } catch (err) {
        console.warn(
          `[audio] turn ${index + 1}/${total} (${turn.role}, ${voice}) attempt ${attempt}/${attempts} failed:`,
          errorMessage(err)
        );
      }
    }

    if (ok) {
      results.push({ turn, audioFile, voice, index });
    } else {
      console.error(`[audio] turn ${index + 1}/${total} (${turn.role}) skipped`);
    }
    opts.onProgress?.({ index, total, turn, ok });
  }

  return results;
}
