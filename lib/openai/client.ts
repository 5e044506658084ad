import { z } from "zod";
import { getConfig } from "../config";
import { StudioError } from "../errors";
import type { TtsVoice } from "../types";

export type OpenAICredentials = {
  apiKey: string;
  baseUrl: string;
};

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string | ChatContentPart[];
};

export const CHAT_MAX_TOKENS = 2000;
export const CHAT_TEMPERATURE = 0.7;

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

/** A key sent from the browser settings wins over the server's own. */
export function resolveCredentials(requestKey?: string): OpenAICredentials {
  const { openai } = getConfig();
  const apiKey = requestKey?.trim() || openai.apiKey;
  if (!apiKey) {
    throw new StudioError(
      "Missing OpenAI API key. Add it in Settings or set OPENAI_API_KEY on the server.",
      400,
      "missing_api_key"
    );
  }
  return { apiKey, baseUrl: openai.baseUrl };
}

export async function chatComplete(
  creds: OpenAICredentials,
  args: { model: string; messages: ChatMessage[]; tag: string }
): Promise<string> {
  const response = await fetch(`${creds.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${creds.apiKey}`,
    },
    body: JSON.stringify({
      model: args.model,
      temperature: CHAT_TEMPERATURE,
      max_tokens: CHAT_MAX_TOKENS,
      messages: args.messages,
    }),
  });

  if (!response.ok) {
    const errText = await response.text();
    console.error(`OpenAI API error (${args.tag}):`, response.status, errText);
    throw new StudioError(`OpenAI API request failed (${args.tag}).`, 502, "upstream_failed", {
      status: response.status,
    });
  }

  const parsed = ChatResponseSchema.safeParse(await response.json());
  const content = parsed.success ? parsed.data.choices[0]?.message.content?.trim() ?? "" : "";
  if (!content) {
    throw new StudioError(`OpenAI returned no content (${args.tag}).`, 502, "upstream_empty");
  }
  return content;
}

export async function synthesizeSpeech(
  creds: OpenAICredentials,
  args: { model: string; voice: TtsVoice; input: string }
): Promise<Buffer> {
  const response = await fetch(`${creds.baseUrl}/audio/speech`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${creds.apiKey}`,
    },
    body: JSON.stringify({
      model: args.model,
      voice: args.voice,
      input: args.input,
      response_format: "mp3",
    }),
  });

  if (!response.ok) {
    const errText = await response.text();
    throw new StudioError(`OpenAI TTS ${response.status}: ${errText.slice(0, 300)}`, 502, "tts_failed", {
      status: response.status,
      voice: args.voice,
    });
  }

  const audio = Buffer.from(await response.arrayBuffer());
  if (audio.length === 0) {
    throw new StudioError(`OpenAI TTS returned an empty payload (${args.voice}).`, 502, "tts_empty");
  }
  return audio;
}
