import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors";
import type { TrackConcatenator } from "./concat";
import { encodeWav } from "./wav";

export type DecodedClip = {
  channels: Float32Array[];
  sampleRate: number;
};

export interface ClipDecoder {
  readonly name: string;
  decode(bytes: Uint8Array): Promise<DecodedClip>;
}

export function downmix(clip: DecodedClip): Float32Array {
  const [first, ...rest] = clip.channels;
  if (!first) return new Float32Array(0);
  if (rest.length === 0) return first;

  const out = new Float32Array(first.length);
  for (let i = 0; i < out.length; i++) {
    let sum = first[i] ?? 0;
    for (const ch of rest) sum += ch[i] ?? 0;
    out[i] = sum / clip.channels.length;
  }
  return out;
}

/** Linear interpolation; good enough for speech. */
export function resample(samples: Float32Array, from: number, to: number): Float32Array {
  if (from === to || samples.length === 0) return samples;
  const length = Math.max(1, Math.round((samples.length * to) / from));
  const out = new Float32Array(length);
  const step = from / to;
  for (let i = 0; i < length; i++) {
    const pos = i * step;
    const i0 = Math.min(Math.floor(pos), samples.length - 1);
    const i1 = Math.min(i0 + 1, samples.length - 1);
    const frac = pos - i0;
    out[i] = (samples[i0] ?? 0) * (1 - frac) + (samples[i1] ?? 0) * frac;
  }
  return out;
}

export type PcmOptions = {
  decoder: ClipDecoder;
  silenceMs: number;
};

/**
 * Decode every clip, join them with a fixed silence between neighbours and
 * write one mono WAV at the first clip's sample rate.
 */
export function createPcmConcatenator(opts: PcmOptions): TrackConcatenator {
  return {
    method: "pcm",

    async isAvailable() {
      return true;
    },

    async concat(files, outputStem) {
      const output = `${outputStem}.wav`;
      const pieces: Float32Array[] = [];
      let rate: number | undefined;
      let clips = 0;

      try {
        for (const [i, file] of files.entries()) {
          let mono: Float32Array;
          let clipRate: number;
          try {
            const clip = await opts.decoder.decode(await readFile(file));
            mono = downmix(clip);
            clipRate = clip.sampleRate;
            if (mono.length === 0 || clipRate <= 0) throw new Error("no samples");
          } catch (err) {
            console.warn(`[pcm] clip ${i + 1} (${path.basename(file)}) skipped:`, errorMessage(err));
            continue;
          }

          rate ??= clipRate;
          if (clips > 0) pieces.push(new Float32Array(Math.round((rate * opts.silenceMs) / 1000)));
          pieces.push(resample(mono, clipRate, rate));
          clips++;
        }

        if (!rate || clips === 0) {
          console.warn("[pcm] nothing decoded");
          return null;
        }

        const total = pieces.reduce((n, p) => n + p.length, 0);
        const merged = new Float32Array(total);
        let offset = 0;
        for (const p of pieces) {
          merged.set(p, offset);
          offset += p.length;
        }

        await writeFile(output, encodeWav(merged, rate));
        console.info(`[pcm] joined ${clips} clips with ${opts.silenceMs}ms gaps (${opts.decoder.name})`);
        return output;
      } catch (err) {
        console.warn("[pcm] concatenation error:", errorMessage(err));
        return null;
      }
    },
  };
}
