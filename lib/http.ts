import { NextResponse } from "next/server";
import { z, ZodError } from "zod";
import { StudioError } from "./errors";

export async function readJsonBody<S extends z.ZodTypeAny>(req: Request, schema: S): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new StudioError("Invalid JSON body in request.", 400, "invalid_json");
  }
  return schema.parse(body);
}

function describeIssue(err: ZodError) {
  const issue = err.issues[0];
  if (!issue) return "Invalid request.";
  const where = issue.path.join(".");
  return where ? `${where}: ${issue.message}` : issue.message;
}

export function errorResponse(tag: string, err: unknown) {
  if (err instanceof ZodError) {
    return NextResponse.json({ error: describeIssue(err) }, { status: 400 });
  }
  if (err instanceof StudioError) {
    if (err.status >= 500) console.error(`[${tag}] ${err.code}:`, err.message, err.details ?? "");
    return NextResponse.json({ error: err.message, code: err.code }, { status: err.status });
  }
  console.error(`[${tag}] error:`, err);
  return NextResponse.json({ error: `Unexpected error in ${tag}.` }, { status: 500 });
}
