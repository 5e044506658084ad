import { randomUUID } from "node:crypto";
import { rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorMessage } from "../errors";
import { runCommand, type CommandRunner } from "./command";
import type { TrackConcatenator } from "./concat";

export type FfmpegOptions = {
  binary: string;
  timeoutMs: number;
  run?: CommandRunner;
  /** Where concat manifests are written. */
  tmpDir?: string;
};

export type FfmpegStatus = { available: boolean; version?: string };

const PROBE_TIMEOUT_MS = 10_000;

/** Quote a path for the concat demuxer: 'it'\''s' */
export function escapeConcatPath(file: string) {
  return file.replace(/'/g, "'\\''");
}

export function buildConcatManifest(files: readonly string[]) {
  return files.map((f) => `file '${escapeConcatPath(path.resolve(f))}'`).join("\n") + "\n";
}

export async function detectFfmpeg(binary: string, run: CommandRunner = runCommand): Promise<FfmpegStatus> {
  const result = await run(binary, ["-version"], { timeoutMs: PROBE_TIMEOUT_MS });
  if (result.error || result.code !== 0) return { available: false };
  const version = result.stdout.match(/ffmpeg version (\S+)/)?.[1];
  return { available: true, version };
}

async function isNonEmptyFile(file: string) {
  try {
    return (await stat(file)).size > 0;
  } catch {
    return false;
  }
}

/**
 * Stream-copy concatenation (no re-encode) through the ffmpeg concat demuxer.
 */
export function createFfmpegConcatenator(opts: FfmpegOptions): TrackConcatenator {
  const run = opts.run ?? runCommand;
  let availability: Promise<boolean> | null = null;

  return {
    method: "ffmpeg",

    isAvailable() {
      availability ??= detectFfmpeg(opts.binary, run).then((p) => p.available);
      return availability;
    },

    async concat(files, outputStem) {
      if (files.length === 0) return null;

      const output = `${outputStem}.mp3`;
      const manifest = path.join(opts.tmpDir ?? os.tmpdir(), `concat-${randomUUID()}.txt`);

      try {
        await writeFile(manifest, buildConcatManifest(files), "utf8");
        const result = await run(
          opts.binary,
          ["-f", "concat", "-safe", "0", "-i", manifest, "-c", "copy", "-y", output],
          { timeoutMs: opts.timeoutMs }
        );

        if (result.error) {
          console.warn("[ffmpeg] could not start:", result.error.message);
          return null;
        }
        if (result.timedOut) {
          console.warn(`[ffmpeg] timed out after ${opts.timeoutMs}ms`);
          return null;
        }
        if (result.code !== 0) {
          console.warn(`[ffmpeg] exited with ${result.code}:`, result.stderr.trim().split("\n").slice(-3).join(" | "));
          return null;
        }
        if (!(await isNonEmptyFile(output))) {
          console.warn("[ffmpeg] produced no output:", output);
          return null;
        }

        console.info(`[ffmpeg] joined ${files.length} clips -> ${path.basename(output)}`);
        return output;
      } catch (err) {
        console.warn("[ffmpeg] concatenation error:", errorMessage(err));
        return null;
      } finally {
        await rm(manifest, { force: true }).catch((err: unknown) =>
          console.warn("[ffmpeg] could not remove manifest:", errorMessage(err))
        );
      }
    },
  };
}
