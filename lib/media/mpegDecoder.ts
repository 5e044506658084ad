import { MPEGDecoder } from "mpg123-decoder";
import type { ClipDecoder } from "./pcm";

/** MP3 decoding in process (WebAssembly), no external tool needed. */
export const mpegDecoder: ClipDecoder = {
  name: "mpg123-decoder",

  async decode(bytes) {
    const decoder = new MPEGDecoder();
    await decoder.ready;
    try {
      const { channelData, samplesDecoded, sampleRate, errors } = decoder.decode(bytes);
      if (samplesDecoded === 0) {
        throw new Error(errors.length ? `${errors.length} undecodable frames` : "no audio frames");
      }
      return { channels: channelData, sampleRate };
    } finally {
      decoder.free();
    }
  },
};
