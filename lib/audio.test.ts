import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { generateVersionAudio, type VersionAudioOptions } from "./audio";
import type { SpeakFn } from "./dialogue/synthesizer";
import { StudioError } from "./errors";
import type { TrackConcatenator } from "./media/concat";

const copyConcatenator: TrackConcatenator = {
  method: "ffmpeg",
  isAvailable: async () => true,
  async concat(files, stem) {
    const parts = await Promise.all(files.map((f) => readFile(f, "utf8")));
    await writeFile(`${stem}.mp3`, parts.join("|"));
    return `${stem}.mp3`;
  },
};

describe("generateVersionAudio", () => {
  let dataDir: string;
  let spoken: string[];
  let speak: SpeakFn;

  const options = (overrides: Partial<VersionAudioOptions> = {}): VersionAudioOptions => ({
    voices: { voice1: "alloy", voice2: "nova" },
    speak,
    dataDir,
    draftId: "d1",
    concatenators: { primary: copyConcatenator },
    ...overrides,
  });

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "audio-"));
    spoken = [];
    speak = async (text, voice) => {
      spoken.push(`${voice}:${text}`);
      return Buffer.from(text);
    };
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("voices a TED talk as one clip with voice 2", async () => {
    const audio = await generateVersionAudio("ted", "# Why we walk\n[Applause] Walking *changes* everything.", options());

    expect(audio).toEqual({ kind: "single", file: "drafts/d1/ted/ted_audio.mp3", voice: "nova" });
    expect(spoken).toEqual(["nova:Why we walk Walking changes everything."]);
    expect(await readFile(path.join(dataDir, "drafts/d1/ted/ted_audio.mp3"), "utf8")).toBe(
      "Why we walk Walking changes everything."
    );
  });

  it("voices the original script with voice 1", async () => {
    const audio = await generateVersionAudio("original", "Hello there.", options());
    expect(audio).toMatchObject({ kind: "single", voice: "alloy", file: "drafts/d1/original/original_audio.mp3" });
  });

  it("rejects a script with nothing to speak", async () => {
    await expect(generateVersionAudio("basic", "[music] **Title**", options())).rejects.toMatchObject({
      status: 422,
      code: "empty_script",
    });
  });

  it("voices a podcast turn by turn and merges it", async () => {
    const script = "Host: Welcome!\nGuest: Happy to be here.\nHost: Let's begin.";

    const audio = await generateVersionAudio("podcast", script, options());

    expect(spoken).toEqual(["alloy:Welcome!", "nova:Happy to be here.", "alloy:Let's begin."]);
    expect(audio).toEqual({
      kind: "dialogue",
      merged: "drafts/d1/podcast/podcast_merged_dialogue.mp3",
      mergeMethod: "ffmpeg",
      turns: [
        { role: "host", text: "Welcome!", order: 0, voice: "alloy", file: "drafts/d1/podcast/turns/01_host_alloy.mp3" },
        { role: "guest", text: "Happy to be here.", order: 1, voice: "nova", file: "drafts/d1/podcast/turns/02_guest_nova.mp3" },
        { role: "host", text: "Let's begin.", order: 2, voice: "alloy", file: "drafts/d1/podcast/turns/03_host_alloy.mp3" },
      ],
      roles: {
        host: "drafts/d1/podcast/turns/01_host_alloy.mp3",
        guest: "drafts/d1/podcast/turns/02_guest_nova.mp3",
      },
    });
    expect(await readFile(path.join(dataDir, "drafts/d1/podcast/podcast_merged_dialogue.mp3"), "utf8")).toBe(
      "Welcome!|Happy to be here.|Let's begin."
    );
  });

  it("keeps the turns when no merge method works", async () => {
    const audio = await generateVersionAudio("dialog", "A: Hi.\nB: Hey.", options({ concatenators: {} }));

    expect(audio.kind).toBe("dialogue");
    if (audio.kind !== "dialogue") return;
    expect(audio.merged).toBeUndefined();
    expect(audio.mergeMethod).toBeUndefined();
    expect(audio.turns.map((t) => t.file)).toEqual([
      "drafts/d1/dialog/turns/01_a_alloy.mp3",
      "drafts/d1/dialog/turns/02_b_nova.mp3",
    ]);
  });

  it("fails when every turn fails", async () => {
    speak = async () => {
      throw new Error("quota exceeded");
    };

    const err = await generateVersionAudio("dialog", "A: Hi.\nB: Hey.", options()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StudioError);
    expect(err).toMatchObject({ status: 502, code: "tts_failed" });
  });

  it("replaces the previous take of the same version", async () => {
    const stale = path.join(dataDir, "drafts/d1/dialog/turns/09_b_nova.mp3");
    await mkdir(path.dirname(stale), { recursive: true });
    await writeFile(stale, "old");

    await generateVersionAudio("dialog", "A: Hi.", options());

    await expect(access(stale)).rejects.toThrow();
  });
});
