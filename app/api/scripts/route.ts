import { NextResponse } from "next/server";
import { z } from "zod";
import { getConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { errorResponse, readJsonBody } from "@/lib/http";
import { chatComplete, resolveCredentials, type ChatContentPart } from "@/lib/openai/client";
import { buildTranslationPrompt, buildVersionPrompt, parseGeneratedScript } from "@/lib/openai/prompts";
import { ChatModelSchema, InputMethodSchema, ScriptVersionSchema } from "@/lib/schemas";
import type { VersionResult } from "@/lib/types";

export const runtime = "nodejs";

const BodySchema = z
  .object({
    version: ScriptVersionSchema,
    category: z.string().trim().min(1).default("General"),
    inputMethod: InputMethodSchema,
    content: z.string().trim().min(1, "Enter some content to build the script from."),
    /** data: URL of the uploaded image, image input only */
    image: z
      .string()
      .regex(/^data:image\/[a-z0-9.+-]+;base64,/i, "Image must be a base64 data URL.")
      .optional(),
    model: ChatModelSchema.optional(),
    apiKey: z.string().optional(),
  })
  .refine((b) => b.inputMethod !== "image" || Boolean(b.image), {
    message: "Upload an image for image input.",
    path: ["image"],
  });

export async function POST(req: Request) {
  try {
    const body = await readJsonBody(req, BodySchema);
    const creds = resolveCredentials(body.apiKey);
    const model = body.model ?? getConfig().openai.model;

    const prompt = buildVersionPrompt(body.version, {
      inputMethod: body.inputMethod,
      category: body.category,
      content: body.content,
    });

    const content: ChatContentPart[] = [{ type: "text", text: prompt }];
    if (body.inputMethod === "image" && body.image) {
      content.push({ type: "image_url", image_url: { url: body.image } });
    }

    const raw = await chatComplete(creds, {
      model,
      messages: [{ role: "user", content }],
      tag: `script:${body.version}`,
    });
    const generated = parseGeneratedScript(raw);
    console.info(`[scripts] ${body.version}: "${generated.title}" (${generated.script.length} chars, ${model})`);

    const result: VersionResult = { ...generated };
    let warning: string | undefined;
    try {
      result.translation = await chatComplete(creds, {
        model,
        messages: [{ role: "user", content: buildTranslationPrompt(generated.script) }],
        tag: `translation:${body.version}`,
      });
    } catch (err) {
      console.warn(`[scripts] ${body.version}: translation failed:`, errorMessage(err));
      warning = "Script generated, but the Korean translation failed.";
    }

    return NextResponse.json({ result, warning });
  } catch (err) {
    return errorResponse("scripts", err);
  }
}
