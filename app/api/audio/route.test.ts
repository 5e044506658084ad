import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function request(body: unknown) {
  return new Request("http://localhost/api/audio", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("POST /api/audio", () => {
  let dataDir: string;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "audio-api-"));
    vi.resetModules();
    vi.stubEnv("STUDIO_DATA_DIR", dataDir);
    fetchMock.mockReset();
    fetchMock.mockImplementation(async () => new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("issues a draft id on the first take", async () => {
    const { POST } = await import("./route");

    const res = await POST(request({ version: "original", script: "Good morning.", apiKey: "test-secret" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.draftId).toMatch(UUID);
    expect(body.audio).toEqual({
      kind: "single",
      file: `drafts/${body.draftId}/original/original_audio.mp3`,
      voice: "alloy",
    });
    expect([...(await readFile(path.join(dataDir, body.audio.file)))]).toEqual([1, 2, 3]);
  });

  it("keeps the draft id it was given", async () => {
    const { POST } = await import("./route");
    const draftId = "5b1f0c9e-3d4a-4c2b-9e8f-0a1b2c3d4e5f";

    const res = await POST(request({ version: "ted", script: "Ideas matter.", draftId, apiKey: "test-secret" }));
    const body = await res.json();

    expect(body.draftId).toBe(draftId);
    expect(body.audio.file).toBe(`drafts/${draftId}/ted/ted_audio.mp3`);
    expect(body.audio.voice).toBe("nova");
  });

  it("rejects a draft id that is not a uuid", async () => {
    const { POST } = await import("./route");

    const res = await POST(request({ version: "basic", script: "Hi.", draftId: "../escape", apiKey: "test-secret" }));

    expect(res.status).toBe(400);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
