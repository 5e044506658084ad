import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { NextResponse } from "next/server";
import { getConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { errorResponse } from "@/lib/http";
import { detectFfmpeg } from "@/lib/media/ffmpeg";
import { mpegDecoder } from "@/lib/media/mpegDecoder";
import { getProjectStore } from "@/lib/projects/store";

export const runtime = "nodejs";

async function storageWritable(dataDir: string) {
  const testFile = path.join(dataDir, `.write-test-${randomUUID()}`);
  try {
    await mkdir(dataDir, { recursive: true });
    await writeFile(testFile, "ok", "utf8");
    await rm(testFile, { force: true });
    return { writable: true };
  } catch (err) {
    console.warn("[system] data directory is not writable:", errorMessage(err));
    return { writable: false, error: errorMessage(err) };
  }
}

export async function GET() {
  try {
    const config = getConfig();
    const ffmpeg = await detectFfmpeg(config.ffmpeg.path);
    const storage = await storageWritable(config.dataDir);
    const projects = storage.writable ? (await getProjectStore().listProjects()).length : 0;

    return NextResponse.json({
      apiKeyOnServer: Boolean(config.openai.apiKey),
      chatModel: config.openai.model,
      ttsModel: config.openai.ttsModel,
      ffmpeg: { binary: config.ffmpeg.path, ...ffmpeg },
      fallback: { decoder: mpegDecoder.name, silenceMs: config.silenceMs },
      storage: { dataDir: config.dataDir, projects, ...storage },
      node: process.version,
    });
  } catch (err) {
    return errorResponse("system", err);
  }
}
