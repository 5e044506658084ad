import { NextResponse } from "next/server";
import { z } from "zod";
import { errorResponse, readJsonBody } from "@/lib/http";
import { getProjectStore } from "@/lib/projects/store";
import { InputMethodSchema, ScriptVersionSchema, VersionResultSchema } from "@/lib/schemas";

export const runtime = "nodejs";

const QuerySchema = z.object({
  q: z.string().optional(),
  category: z.string().optional(),
  sort: z.enum(["recent", "title"]).default("recent"),
});

const BodySchema = z.object({
  projectId: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).default("General"),
  inputMethod: InputMethodSchema,
  inputContent: z.string(),
  version: ScriptVersionSchema,
  result: VersionResultSchema,
});

export async function GET(req: Request) {
  try {
    const params = new URL(req.url).searchParams;
    const query = QuerySchema.parse({
      q: params.get("q") ?? undefined,
      category: params.get("category") ?? undefined,
      sort: params.get("sort") ?? undefined,
    });

    const projects = await getProjectStore().queryProjects({
      search: query.q,
      category: query.category,
      sort: query.sort,
    });
    return NextResponse.json({ projects });
  } catch (err) {
    return errorResponse("projects", err);
  }
}

export async function POST(req: Request) {
  try {
    const body = await readJsonBody(req, BodySchema);
    const saved = await getProjectStore().saveVersion(body);
    return NextResponse.json(saved, { status: saved.created ? 201 : 200 });
  } catch (err) {
    return errorResponse("projects", err);
  }
}
