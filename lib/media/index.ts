import { getConfig } from "../config";
import type { TrackConcatenator } from "./concat";
import { createFfmpegConcatenator } from "./ffmpeg";
import { mpegDecoder } from "./mpegDecoder";
import { createPcmConcatenator } from "./pcm";

export type Concatenators = {
  primary: TrackConcatenator;
  fallback: TrackConcatenator;
};

let cached: Concatenators | null = null;

/** ffmpeg stream copy first, in-process re-encode second. */
export function defaultConcatenators(): Concatenators {
  if (!cached) {
    const config = getConfig();
    cached = {
      primary: createFfmpegConcatenator({ binary: config.ffmpeg.path, timeoutMs: config.ffmpeg.timeoutMs }),
      fallback: createPcmConcatenator({ decoder: mpegDecoder, silenceMs: config.silenceMs }),
    };
  }
  return cached;
}
