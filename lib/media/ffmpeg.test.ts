import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CommandResult, CommandRunner } from "./command";
import { buildConcatManifest, createFfmpegConcatenator, escapeConcatPath, detectFfmpeg } from "./ffmpeg";

function done(partial: Partial<CommandResult> = {}): CommandResult {
  return { code: 0, stdout: "", stderr: "", timedOut: false, ...partial };
}

describe("concat manifest", () => {
  it("quotes single quotes the way the concat demuxer expects", () => {
    expect(escapeConcatPath("/data/it's/a.mp3")).toBe("/data/it'\\''s/a.mp3");
  });

  it("lists one absolute file per line", () => {
    expect(buildConcatManifest(["/a/01.mp3", "/a/02.mp3"])).toBe("file '/a/01.mp3'\nfile '/a/02.mp3'\n");
  });
});

describe("detectFfmpeg", () => {
  it("reads the version banner", async () => {
    const run: CommandRunner = async () => done({ stdout: "ffmpeg version 6.1.1-3ubuntu5 Copyright (c) 2000-2023" });
    expect(await detectFfmpeg("ffmpeg", run)).toEqual({ available: true, version: "6.1.1-3ubuntu5" });
  });

  it("reports a missing binary", async () => {
    const run: CommandRunner = async () => done({ code: null, error: new Error("spawn ffmpeg ENOENT") });
    expect(await detectFfmpeg("ffmpeg", run)).toEqual({ available: false });
  });
});

describe("createFfmpegConcatenator", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ffmpeg-"));
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("stream-copies the clips through a manifest and cleans it up", async () => {
    let manifest = "";
    const run = vi.fn<CommandRunner>(async (_bin, args) => {
      manifest = await readFile(args[5] ?? "", "utf8");
      await writeFile(args[args.length - 1] ?? "", "merged");
      return done();
    });
    const concat = createFfmpegConcatenator({ binary: "/opt/ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    const output = await concat.concat(["/clips/01.mp3", "/clips/02.mp3"], path.join(dir, "podcast_merged_dialogue"));

    expect(output).toBe(path.join(dir, "podcast_merged_dialogue.mp3"));
    expect(manifest).toBe("file '/clips/01.mp3'\nfile '/clips/02.mp3'\n");
    const call = run.mock.calls[0];
    expect(call?.[0]).toBe("/opt/ffmpeg");
    expect(call?.[1].slice(0, 4)).toEqual(["-f", "concat", "-safe", "0"]);
    expect(call?.[1].slice(6)).toEqual(["-c", "copy", "-y", output]);
    expect(call?.[2]).toEqual({ timeoutMs: 5000 });
    expect(await readdir(dir)).toEqual(["podcast_merged_dialogue.mp3"]);
  });

  it("fails on a non-zero exit", async () => {
    const run: CommandRunner = async () => done({ code: 1, stderr: "Invalid data found when processing input" });
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    expect(await concat.concat(["/clips/01.mp3"], path.join(dir, "out"))).toBeNull();
    expect(await readdir(dir)).toEqual([]);
  });

  it("fails on a timeout", async () => {
    const run: CommandRunner = async () => done({ code: null, timedOut: true });
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 10, run, tmpDir: dir });

    expect(await concat.concat(["/clips/01.mp3"], path.join(dir, "out"))).toBeNull();
  });

  it("fails when ffmpeg exits cleanly without writing output", async () => {
    const run: CommandRunner = async () => done();
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    expect(await concat.concat(["/clips/01.mp3"], path.join(dir, "out"))).toBeNull();
  });

  it("fails when the output is empty", async () => {
    const run: CommandRunner = async (_bin, args) => {
      await writeFile(args[args.length - 1] ?? "", "");
      return done();
    };
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    expect(await concat.concat(["/clips/01.mp3"], path.join(dir, "out"))).toBeNull();
  });

  it("returns null for no clips without running anything", async () => {
    const run = vi.fn<CommandRunner>(async () => done());
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    expect(await concat.concat([], path.join(dir, "out"))).toBeNull();
    expect(run).not.toHaveBeenCalled();
  });

  it("checks availability once", async () => {
    const run = vi.fn<CommandRunner>(async () => done({ stdout: "ffmpeg version 7.0" }));
    const concat = createFfmpegConcatenator({ binary: "ffmpeg", timeoutMs: 5000, run, tmpDir: dir });

    expect(await concat.isAvailable()).toBe(true);
    expect(await concat.isAvailable()).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
