import path from "node:path";
import { errorMessage } from "../errors";
import type { TrackConcatenator } from "../media/concat";
import type { AssembledTrack, SynthesisResult } from "../types";

export type AssembleOptions = {
  outDir: string;
  /** File name without extension; each method adds its own. */
  stem: string;
  primary?: TrackConcatenator;
  fallback?: TrackConcatenator;
};

async function available(c: TrackConcatenator) {
  try {
    return await c.isAvailable();
  } catch (err) {
    console.warn(`[audio] ${c.method} availability check failed:`, errorMessage(err));
    return false;
  }
}

/**
 * Join per-turn clips in dialogue order. The fallback only runs when the
 * primary method is missing or fails; the turn list is returned either way.
 */
export async function assembleTrack(
  results: readonly SynthesisResult[],
  opts: AssembleOptions
): Promise<AssembledTrack> {
  const turns = [...results].sort((a, b) => a.index - b.index);
  if (turns.length === 0) return { turns };

  const files = turns.map((r) => r.audioFile);
  const outputStem = path.join(opts.outDir, opts.stem);

  for (const concatenator of [opts.primary, opts.fallback]) {
    if (!concatenator) continue;

    if (!(await available(concatenator))) {
      console.warn(`[audio] ${concatenator.method} is not available`);
      continue;
    }

    const merged = await concatenator.concat(files, outputStem);
    if (merged) {
      console.info(`[audio] merged ${files.length} turns with ${concatenator.method}`);
      return { merged, method: concatenator.method, turns };
    }
    console.warn(`[audio] ${concatenator.method} could not merge the turns`);
  }

  console.error(`[audio] no merged track for ${opts.stem}; keeping ${turns.length} turn files`);
  return { turns };
}
