import path from "node:path";
import { z } from "zod";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalString = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENAI_MODEL: optionalString("gpt-4o-mini"),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://api.openai.com/v1")),
  OPENAI_TTS_MODEL: optionalString("tts-1"),
  STUDIO_DATA_DIR: optionalString("studio_data"),
  FFMPEG_PATH: optionalString("ffmpeg"),
  CONCAT_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(60_000)),
  CONCAT_SILENCE_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(1000)),
});

export type StudioConfig = {
  openai: {
    apiKey?: string;
    model: string;
    baseUrl: string;
    ttsModel: string;
  };
  dataDir: string;
  ffmpeg: {
    path: string;
    timeoutMs: number;
  };
  silenceMs: number;
};

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env, cwd = process.cwd()): StudioConfig {
  const parsed = EnvSchema.parse(env);
  return {
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      baseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
      ttsModel: parsed.OPENAI_TTS_MODEL,
    },
    dataDir: path.resolve(cwd, parsed.STUDIO_DATA_DIR),
    ffmpeg: {
      path: parsed.FFMPEG_PATH,
      timeoutMs: parsed.CONCAT_TIMEOUT_MS,
    },
    silenceMs: parsed.CONCAT_SILENCE_MS,
  };
}

let cached: StudioConfig | null = null;

export function getConfig(): StudioConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
