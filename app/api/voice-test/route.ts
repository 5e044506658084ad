import { z } from "zod";
import { getConfig } from "@/lib/config";
import { errorResponse, readJsonBody } from "@/lib/http";
import { resolveCredentials, synthesizeSpeech } from "@/lib/openai/client";
import { TtsVoiceSchema } from "@/lib/schemas";

export const runtime = "nodejs";

const BodySchema = z.object({
  voice: TtsVoiceSchema,
  text: z.string().trim().min(1).max(300).optional(),
  apiKey: z.string().optional(),
});

export async function POST(req: Request) {
  try {
    const body = await readJsonBody(req, BodySchema);
    const creds = resolveCredentials(body.apiKey);
    const input = body.text ?? `Hello! This is the ${body.voice} voice. Nice to meet you.`;

    const audio = await synthesizeSpeech(creds, { model: getConfig().openai.ttsModel, voice: body.voice, input });
    return new Response(new Uint8Array(audio), {
      headers: { "Content-Type": "audio/mpeg", "Cache-Control": "no-store" },
    });
  } catch (err) {
    return errorResponse("voice-test", err);
  }
}
