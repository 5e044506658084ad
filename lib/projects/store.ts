import { randomUUID } from "node:crypto";
import { access, copyFile, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { getConfig } from "../config";
import { errorMessage, StudioError } from "../errors";
import {
  ProjectIndexSchema,
  ProjectMetadataSchema,
  type ProjectIndex,
  type ProjectIndexEntry,
  type ProjectMetadata,
} from "../schemas";
import type { InputMethod, ScriptVersion, SpeakerRole, TurnAudio, VersionAudio, VersionResult } from "../types";
import { scriptFileName, translationFileName } from "../versions";
import { resolveDataPath, toDataRelative } from "./paths";
import type { ProjectSort } from "./query";

const SAFE_CHARS = /[A-Za-z0-9\-_() ]/;

export function sanitizeFilename(name: string) {
  const kept = [...name].filter((c) => SAFE_CHARS.test(c)).join("");
  const collapsed = kept.split(/\s+/).filter(Boolean).join(" ").slice(0, 50).trim();
  return collapsed || "Untitled";
}

function pad(n: number) {
  return String(n).padStart(2, "0");
}

/** YYYYMMDD_HHMMSS, local time. */
export function projectIdFor(date: Date) {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function exists(file: string) {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

/** Readers see the old file or the new one, never a partial write. */
async function writeJsonAtomic(file: string, value: unknown) {
  const tmp = `${file}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmp, JSON.stringify(value, null, 2), "utf8");
    await rename(tmp, file);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

const ROLES: readonly SpeakerRole[] = ["host", "guest", "a", "b"];

function roleFiles(roles: Partial<Record<SpeakerRole, string>>): Array<[SpeakerRole, string]> {
  const out: Array<[SpeakerRole, string]> = [];
  for (const role of ROLES) {
    const ref = roles[role];
    if (ref) out.push([role, ref]);
  }
  return out;
}

export type SaveVersionInput = {
  /** Project to add the version to; a new project is created when absent or unknown. */
  projectId?: string;
  category: string;
  inputMethod: InputMethod;
  inputContent: string;
  version: ScriptVersion;
  result: VersionResult;
};

export type SavedProject = {
  projectId: string;
  projectPath: string;
  created: boolean;
  metadata: ProjectMetadata;
};

export type LoadedVersion = {
  title: string;
  koreanTitle?: string;
  script?: string;
  translation?: string;
  audio?: VersionAudio;
};

export type ProjectContent = {
  metadata: ProjectMetadata;
  versions: Partial<Record<ScriptVersion, LoadedVersion>>;
};

export type ProjectQuery = {
  search?: string;
  category?: string;
  sort?: ProjectSort;
};

export class ProjectStore {
  readonly scriptsDir: string;
  readonly indexFile: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly baseDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.scriptsDir = path.join(baseDir, "scripts");
    this.indexFile = path.join(baseDir, "project_index.json");
  }

  resolve(relative: string) {
    return resolveDataPath(this.baseDir, relative);
  }

  private rel(absolute: string) {
    return toDataRelative(this.baseDir, absolute);
  }

  /** Changes to the index and project folders run one at a time, in call order. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    // the caller gets the failure through `run`; the next change still runs
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /* --------------------------------- Index --------------------------------- */

  private async readIndex(): Promise<ProjectIndex> {
    let raw: string;
    try {
      raw = await readFile(this.indexFile, "utf8");
    } catch {
      return { projects: [] };
    }
    let parsed;
    try {
      parsed = ProjectIndexSchema.safeParse(JSON.parse(raw));
    } catch (err) {
      throw new StudioError("Project index is unreadable.", 500, "index_corrupt", { issue: errorMessage(err) });
    }
    if (!parsed.success) {
      throw new StudioError("Project index is unreadable.", 500, "index_corrupt", {
        issue: parsed.error.issues[0]?.message,
      });
    }
    return parsed.data;
  }

  private async writeIndex(index: ProjectIndex) {
    await mkdir(this.baseDir, { recursive: true });
    await writeJsonAtomic(this.indexFile, index);
  }

  private async updateIndex(metadata: ProjectMetadata, projectPath: string) {
    const index = await this.readIndex();
    const existing = index.projects.find((p) => p.projectId === metadata.projectId);

    if (existing) {
      existing.title = metadata.title;
      existing.category = metadata.category;
      existing.updatedAt = metadata.updatedAt;
    } else {
      index.projects.push({
        projectId: metadata.projectId,
        title: metadata.title,
        category: metadata.category,
        projectPath,
        createdAt: metadata.createdAt,
      });
      index.projects.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }

    await this.writeIndex(index);
  }

  /* ------------------------------- Metadata -------------------------------- */

  private async readMetadata(folder: string): Promise<ProjectMetadata | null> {
    const file = path.join(folder, "metadata.json");
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch {
      return null;
    }
    try {
      const parsed = ProjectMetadataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      console.warn(`[store] invalid metadata in ${this.rel(file)}:`, parsed.error.issues[0]?.message);
    } catch (err) {
      console.warn(`[store] unreadable metadata in ${this.rel(file)}:`, errorMessage(err));
    }
    return null;
  }

  private async writeMetadata(folder: string, metadata: ProjectMetadata) {
    await writeJsonAtomic(path.join(folder, "metadata.json"), metadata);
  }

  private allocateProjectId(index: ProjectIndex, now: Date) {
    const base = projectIdFor(now);
    const taken = new Set(index.projects.map((p) => p.projectId));
    let id = base;
    for (let n = 2; taken.has(id); n++) id = `${base}_${n}`;
    return id;
  }

  /* --------------------------------- Save ---------------------------------- */

  private isInside(ref: string, dir: string) {
    try {
      return this.resolve(ref).startsWith(dir + path.sep);
    } catch {
      return false;
    }
  }

  private async copyInto(sourceRef: string, dest: string): Promise<string | undefined> {
    let source: string;
    try {
      source = this.resolve(sourceRef);
    } catch {
      console.warn(`[store] ignoring audio reference outside the data directory: ${sourceRef}`);
      return undefined;
    }
    if (path.resolve(source) !== path.resolve(dest)) {
      if (!(await exists(source))) {
        console.warn(`[store] audio file missing, not saved: ${sourceRef}`);
        return undefined;
      }
      await mkdir(path.dirname(dest), { recursive: true });
      await copyFile(source, dest);
    }
    return this.rel(dest);
  }

  private async saveAudio(folder: string, version: ScriptVersion, audio: VersionAudio): Promise<VersionAudio | undefined> {
    const audioDir = path.join(folder, "audio");
    const ext = (ref: string) => path.extname(ref) || ".mp3";

    if (audio.kind === "single") {
      const name = version === "original" ? "original_audio" : `${version}_audio`;
      const file = await this.copyInto(audio.file, path.join(audioDir, `${name}${ext(audio.file)}`));
      return file ? { kind: "single", file, voice: audio.voice } : undefined;
    }

    const sentencesDir = path.join(audioDir, `${version}_sentences`);
    const turns: TurnAudio[] = [];
    const staged: Array<{ turn: TurnAudio; dest: string }> = [...audio.turns]
      .sort((a, b) => a.order - b.order)
      .map((turn, i) => ({
        turn,
        dest: path.join(sentencesDir, `${pad(i + 1)}_${turn.role}_${turn.voice}${ext(turn.file)}`),
      }));

    // turns re-saved from this project already live in the sentences folder
    const resaving = staged.some(({ turn }) => this.isInside(turn.file, sentencesDir));
    if (!resaving) await rm(sentencesDir, { recursive: true, force: true });

    for (const { turn, dest } of staged) {
      const file = await this.copyInto(turn.file, dest);
      if (file) turns.push({ ...turn, file });
    }

    let merged: string | undefined;
    if (audio.merged) {
      merged = await this.copyInto(audio.merged, path.join(audioDir, `${version}_merged_dialogue${ext(audio.merged)}`));
    }

    const roles: Partial<Record<SpeakerRole, string>> = {};
    for (const [role, ref] of roleFiles(audio.roles)) {
      const file = await this.copyInto(ref, path.join(audioDir, `${version}_audio_${role}${ext(ref)}`));
      if (file) roles[role] = file;
    }

    if (!merged && turns.length === 0) return undefined;
    return { kind: "dialogue", merged, mergeMethod: merged ? audio.mergeMethod : undefined, turns, roles };
  }

  /**
   * Write one version into a project, creating the project on first save.
   * Scripts and translations are overwritten; audio is copied out of the
   * draft area.
   */
  saveVersion(input: SaveVersionInput): Promise<SavedProject> {
    return this.exclusive(() => this.writeVersion(input));
  }

  private async writeVersion(input: SaveVersionInput): Promise<SavedProject> {
    await mkdir(this.scriptsDir, { recursive: true });
    const index = await this.readIndex();
    const now = this.now();
    const timestamp = now.toISOString();

    let entry: ProjectIndexEntry | undefined = input.projectId
      ? index.projects.find((p) => p.projectId === input.projectId)
      : undefined;
    if (input.projectId && !entry) {
      console.warn(`[store] project ${input.projectId} not found, starting a new one`);
    }

    let folder: string;
    let metadata: ProjectMetadata | null = null;
    const created = !entry;

    if (entry) {
      folder = this.resolve(entry.projectPath);
      await mkdir(folder, { recursive: true });
      metadata = await this.readMetadata(folder);
    } else {
      const projectId = this.allocateProjectId(index, now);
      const title = input.result.title || `Script_${projectId}`;
      folder = path.join(this.scriptsDir, `${projectId}_${sanitizeFilename(title)}`);
      await mkdir(folder, { recursive: true });
      entry = {
        projectId,
        title,
        category: input.category,
        projectPath: this.rel(folder),
        createdAt: timestamp,
      };
    }

    metadata ??= {
      projectId: entry.projectId,
      title: entry.title,
      koreanTitle: input.result.koreanTitle || undefined,
      category: input.category,
      inputMethod: input.inputMethod,
      inputContent: input.inputContent,
      createdAt: entry.createdAt,
      versions: [],
      files: {},
    };

    const { version, result } = input;
    const scriptFile = path.join(folder, scriptFileName(version));
    await writeFile(scriptFile, result.script, "utf8");

    let translation: string | undefined;
    if (result.translation) {
      const translationFile = path.join(folder, translationFileName(version));
      await writeFile(translationFile, result.translation, "utf8");
      translation = this.rel(translationFile);
    }

    const audio = result.audio ? await this.saveAudio(folder, version, result.audio) : undefined;

    metadata.category = input.category;
    metadata.files[version] = {
      title: result.title,
      koreanTitle: result.koreanTitle || undefined,
      script: this.rel(scriptFile),
      translation: translation ?? metadata.files[version]?.translation,
      audio: audio ?? metadata.files[version]?.audio,
    };
    if (!metadata.versions.includes(version)) metadata.versions.push(version);
    metadata.updatedAt = timestamp;

    await this.writeMetadata(folder, metadata);
    await this.updateIndex(metadata, entry.projectPath);

    console.info(`[store] saved ${version} into ${entry.projectPath}${created ? " (new project)" : ""}`);
    return { projectId: metadata.projectId, projectPath: entry.projectPath, created, metadata };
  }

  /* --------------------------------- Read ---------------------------------- */

  async listProjects(): Promise<ProjectMetadata[]> {
    const index = await this.readIndex();
    const projects: ProjectMetadata[] = [];

    for (const entry of index.projects) {
      let folder: string;
      try {
        folder = this.resolve(entry.projectPath);
      } catch {
        continue;
      }
      const metadata = await this.readMetadata(folder);
      if (metadata) projects.push(metadata);
    }
    return projects;
  }

  async queryProjects(query: ProjectQuery = {}): Promise<ProjectMetadata[]> {
    const needle = query.search?.trim().toLowerCase() ?? "";
    const category = query.category && query.category !== "all" ? query.category : null;

    const projects = (await this.listProjects()).filter((p) => {
      if (category && p.category !== category) return false;
      if (!needle) return true;
      return p.title.toLowerCase().includes(needle) || p.inputContent.toLowerCase().includes(needle);
    });

    if (query.sort === "title") {
      projects.sort((a, b) => a.title.localeCompare(b.title));
    } else {
      projects.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }
    return projects;
  }

  private async readText(ref: string | undefined) {
    if (!ref) return undefined;
    try {
      return await readFile(this.resolve(ref), "utf8");
    } catch {
      return undefined;
    }
  }

  private async existing(ref: string | undefined) {
    if (!ref) return undefined;
    try {
      return (await exists(this.resolve(ref))) ? ref : undefined;
    } catch {
      return undefined;
    }
  }

  private async existingAudio(audio: VersionAudio | undefined): Promise<VersionAudio | undefined> {
    if (!audio) return undefined;
    if (audio.kind === "single") {
      return (await this.existing(audio.file)) ? audio : undefined;
    }

    const turns: TurnAudio[] = [];
    for (const t of audio.turns) {
      if (await this.existing(t.file)) turns.push(t);
    }
    const roles: Partial<Record<SpeakerRole, string>> = {};
    for (const [role, ref] of roleFiles(audio.roles)) {
      if (await this.existing(ref)) roles[role] = ref;
    }
    const merged = await this.existing(audio.merged);
    if (!merged && turns.length === 0) return undefined;
    return { ...audio, merged, turns, roles };
  }

  async loadProject(projectId: string): Promise<ProjectContent | null> {
    const metadata = (await this.listProjects()).find((p) => p.projectId === projectId);
    if (!metadata) return null;

    const versions: ProjectContent["versions"] = {};
    for (const version of metadata.versions) {
      const saved = metadata.files[version];
      if (!saved) continue;
      versions[version] = {
        title: saved.title,
        koreanTitle: saved.koreanTitle,
        script: await this.readText(saved.script),
        translation: await this.readText(saved.translation),
        audio: await this.existingAudio(saved.audio),
      };
    }
    return { metadata, versions };
  }

  /* -------------------------------- Delete --------------------------------- */

  deleteProject(projectId: string): Promise<boolean> {
    return this.exclusive(() => this.removeProject(projectId));
  }

  private async removeProject(projectId: string): Promise<boolean> {
    const index = await this.readIndex();
    const entry = index.projects.find((p) => p.projectId === projectId);
    if (!entry) return false;

    try {
      await rm(this.resolve(entry.projectPath), { recursive: true, force: true });
    } catch (err) {
      if (err instanceof StudioError) {
        console.warn(`[store] not removing folder outside the data directory: ${entry.projectPath}`);
      } else {
        throw err;
      }
    }

    await this.writeIndex({ projects: index.projects.filter((p) => p.projectId !== projectId) });
    console.info(`[store] deleted project ${projectId}`);
    return true;
  }
}

let shared: ProjectStore | null = null;

export function getProjectStore(): ProjectStore {
  if (!shared) shared = new ProjectStore(getConfig().dataDir);
  return shared;
}
