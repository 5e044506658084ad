import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { z } from "zod";
import { generateVersionAudio } from "@/lib/audio";
import { getConfig } from "@/lib/config";
import { errorResponse, readJsonBody } from "@/lib/http";
import { defaultConcatenators } from "@/lib/media";
import { resolveCredentials, synthesizeSpeech } from "@/lib/openai/client";
import { ScriptVersionSchema, TtsVoiceSchema } from "@/lib/schemas";
import { DEFAULT_VOICES } from "@/lib/versions";

export const runtime = "nodejs";

const BodySchema = z.object({
  version: ScriptVersionSchema,
  script: z.string().trim().min(1, "Generate a script first."),
  /** Groups the audio of one unsaved session; issued here on the first take. */
  draftId: z.string().uuid().optional(),
  voice1: TtsVoiceSchema.default(DEFAULT_VOICES.voice1),
  voice2: TtsVoiceSchema.default(DEFAULT_VOICES.voice2),
  apiKey: z.string().optional(),
});

export async function POST(req: Request) {
  try {
    const body = await readJsonBody(req, BodySchema);
    const creds = resolveCredentials(body.apiKey);
    const config = getConfig();
    const draftId = body.draftId ?? randomUUID();

    const audio = await generateVersionAudio(body.version, body.script, {
      voices: { voice1: body.voice1, voice2: body.voice2 },
      speak: (input, voice) => synthesizeSpeech(creds, { model: config.openai.ttsModel, voice, input }),
      dataDir: config.dataDir,
      draftId,
      concatenators: defaultConcatenators(),
    });

    return NextResponse.json({ audio, draftId });
  } catch (err) {
    return errorResponse("audio", err);
  }
}
