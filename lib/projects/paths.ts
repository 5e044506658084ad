import path from "node:path";
import { StudioError } from "../errors";

/** Stored references are data-relative with forward slashes. */
export function toDataRelative(dataDir: string, absolute: string) {
  return path.relative(dataDir, absolute).split(path.sep).join("/");
}

export function resolveDataPath(dataDir: string, relative: string): string {
  const normalized = relative.replace(/\\/g, "/");
  if (!normalized || path.isAbsolute(normalized) || normalized.split("/").includes("..")) {
    throw new StudioError("Invalid file reference.", 400, "bad_path", { relative });
  }

  const absolute = path.resolve(dataDir, normalized);
  const back = path.relative(dataDir, absolute);
  if (!back || back.startsWith("..") || path.isAbsolute(back)) {
    throw new StudioError("Invalid file reference.", 400, "bad_path", { relative });
  }
  return absolute;
}

export function draftDir(dataDir: string, draftId: string, ...rest: string[]) {
  return path.join(dataDir, "drafts", draftId, ...rest);
}
