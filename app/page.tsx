"use client";

import React, { useCallback, useEffect, useMemo, useState } from "react";
import { errorMessage } from "@/lib/errors";
import {
  downloadBlob,
  practiceDocxBlob,
  practicePdfBlob,
  practiceSections,
  sheetFileName,
  type PracticeSheet,
} from "@/lib/exports";
import { projectsUrl, type ProjectSort } from "@/lib/projects/query";
import type { ProjectContent } from "@/lib/projects/store";
import type { ProjectMetadata } from "@/lib/schemas";
import { defaultSettings, getSettings, saveSettings, SETTINGS_EVENT, type AppSettings } from "@/lib/settings";
import { preview } from "@/lib/text";
import type { InputMethod, ScriptVersion, TtsVoice, VersionAudio, VersionResult } from "@/lib/types";
import {
  CATEGORIES,
  CHAT_MODELS,
  ROLE_LABELS,
  SCRIPT_VERSIONS,
  TTS_VOICES,
  VERSION_LABELS,
  isDialogueVersion,
} from "@/lib/versions";

/**
 * Talk Studio: one page, four tabs.
 * - Create: source input, five script versions, audio, save into a project
 * - Practice: replay a saved project and export a practice sheet
 * - My scripts: search, filter, delete
 * - Settings: API key, model, voices, system check
 */

/* --------------------------------- Types ---------------------------------- */

type Tab = "create" | "practice" | "projects" | "settings";
type Busy = "script" | "audio" | "save";

type ScriptResponse = { result?: VersionResult; warning?: string; error?: string };
type AudioResponse = { audio?: VersionAudio; draftId?: string; error?: string };
type SaveResponse = { projectId?: string; created?: boolean; error?: string };
type ProjectsResponse = { projects?: ProjectMetadata[]; error?: string };
type ProjectResponse = Partial<ProjectContent> & { error?: string };

type SystemInfo = {
  apiKeyOnServer: boolean;
  chatModel: string;
  ttsModel: string;
  ffmpeg: { binary: string; available: boolean; version?: string };
  fallback: { decoder: string; silenceMs: number };
  storage: { dataDir: string; projects: number; writable: boolean; error?: string };
  node: string;
  error?: string;
};

const TABS: Array<{ id: Tab; label: string }> = [
  { id: "create", label: "Create" },
  { id: "practice", label: "Practice" },
  { id: "projects", label: "My scripts" },
  { id: "settings", label: "Settings" },
];

const INPUT_METHODS: Array<{ id: InputMethod; label: string }> = [
  { id: "text", label: "Text" },
  { id: "image", label: "Image" },
  { id: "file", label: "File (.txt / .md)" },
];

/* -------------------------------- Helpers --------------------------------- */

function pick<T extends string>(options: readonly T[], value: string, fallback: T): T {
  return options.find((o) => o === value) ?? fallback;
}

function mediaUrl(ref: string) {
  return `/api/media/${ref.split("/").map(encodeURIComponent).join("/")}`;
}

async function callApi<T extends { error?: string }>(url: string, init?: RequestInit): Promise<T> {
  const res = await fetch(url, init);
  const data: T = await res.json();
  if (!res.ok) throw new Error(data?.error || `Request failed (${res.status})`);
  return data;
}

function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

function readAsDataUrl(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => (typeof reader.result === "string" ? resolve(reader.result) : reject(new Error("Unreadable image")));
    reader.onerror = () => reject(reader.error ?? new Error("Unreadable image"));
    reader.readAsDataURL(file);
  });
}

const inputClass = "rounded-xl border border-white/10 bg-slate-900 px-3 py-2";
const buttonClass =
  "rounded-xl border border-white/10 bg-white/10 px-4 py-2 font-semibold hover:bg-white/15 disabled:opacity-40 disabled:cursor-not-allowed";

/* ------------------------------- Components ------------------------------- */

function AudioPanel({ audio, loop }: { audio: VersionAudio; loop: boolean }) {
  if (audio.kind === "single") {
    return (
      <div className="rounded-2xl border border-white/10 bg-slate-900 p-3">
        <div className="text-xs font-bold text-slate-300">AUDIO · {audio.voice}</div>
        <audio className="mt-2" controls loop={loop} src={mediaUrl(audio.file)} />
      </div>
    );
  }

  return (
    <div className="rounded-2xl border border-white/10 bg-slate-900 p-3">
      {audio.merged ? (
        <>
          <div className="text-xs font-bold text-slate-300">
            FULL DIALOGUE{audio.mergeMethod === "pcm" ? " · re-encoded with pauses" : ""}
          </div>
          <audio className="mt-2" controls loop={loop} src={mediaUrl(audio.merged)} />
        </>
      ) : (
        <div className="text-sm text-amber-200">
          The turns could not be merged into one track. Play them one by one below.
        </div>
      )}

      <div className="mt-3 text-xs font-bold text-slate-300">TURN BY TURN</div>
      <div className="mt-2 space-y-2">
        {audio.turns.map((t) => (
          <div key={t.file} className="rounded-xl border border-white/10 bg-white/5 p-2">
            <div className="text-xs text-slate-400">
              {t.order + 1}. {ROLE_LABELS[t.role]} · {t.voice}
            </div>
            <div className="text-sm">{t.text}</div>
            <audio className="mt-1" controls loop={loop} src={mediaUrl(t.file)} />
          </div>
        ))}
      </div>
    </div>
  );
}

function ScriptPanel({ result, loop }: { result: VersionResult; loop: boolean }) {
  return (
    <div className="flex flex-col gap-3">
      <div>
        <div className="text-lg font-black">{result.title}</div>
        <div className="text-sm text-slate-300">{result.koreanTitle}</div>
      </div>
      <div className="grid gap-3 md:grid-cols-2">
        <div className="rounded-2xl border border-white/10 bg-slate-900 p-3">
          <div className="text-xs font-bold text-slate-300">ENGLISH</div>
          <pre className="mt-2 whitespace-pre-wrap text-sm text-slate-100">{result.script}</pre>
        </div>
        <div className="rounded-2xl border border-white/10 bg-slate-900 p-3">
          <div className="text-xs font-bold text-slate-300">한국어 번역</div>
          <pre className="mt-2 whitespace-pre-wrap text-sm text-slate-100">
            {result.translation || "No translation."}
          </pre>
        </div>
      </div>
      {result.audio && <AudioPanel audio={result.audio} loop={loop} />}
    </div>
  );
}

/* ---------------------------------- Page ---------------------------------- */

export default function Page() {
  const [tab, setTab] = useState<Tab>("create");
  const [settings, setSettings] = useState<AppSettings>(defaultSettings);

  // Create
  const [category, setCategory] = useState<string>("General");
  const [inputMethod, setInputMethod] = useState<InputMethod>("text");
  const [inputText, setInputText] = useState("");
  const [imageDataUrl, setImageDataUrl] = useState("");
  const [fileName, setFileName] = useState("");
  const [activeVersion, setActiveVersion] = useState<ScriptVersion>("original");
  const [results, setResults] = useState<Partial<Record<ScriptVersion, VersionResult>>>({});
  const [busy, setBusy] = useState<Partial<Record<ScriptVersion, Busy>>>({});
  const [status, setStatus] = useState<Partial<Record<ScriptVersion, string>>>({});
  const [projectId, setProjectId] = useState<string | null>(null);
  // issued by /api/audio on the first take of a session
  const [draftId, setDraftId] = useState<string | null>(null);
  const [loop, setLoop] = useState(false);

  // Projects + practice
  const [projects, setProjects] = useState<ProjectMetadata[]>([]);
  const [practiceProjects, setPracticeProjects] = useState<ProjectMetadata[]>([]);
  const [search, setSearch] = useState("");
  const [categoryFilter, setCategoryFilter] = useState("all");
  const [sort, setSort] = useState<ProjectSort>("recent");
  const [projectsStatus, setProjectsStatus] = useState("");
  const [confirmDelete, setConfirmDelete] = useState<string | null>(null);
  const [practiceId, setPracticeId] = useState<string>("");
  const [practice, setPractice] = useState<ProjectContent | null>(null);
  const [practiceStatus, setPracticeStatus] = useState("");

  // Settings
  const [draftSettings, setDraftSettings] = useState<AppSettings>(defaultSettings);
  const [settingsStatus, setSettingsStatus] = useState("");
  const [system, setSystem] = useState<SystemInfo | null>(null);
  const [systemStatus, setSystemStatus] = useState("");

  useEffect(() => {
    const sync = () => {
      const s = getSettings();
      setSettings(s);
      setDraftSettings(s);
    };
    sync();
    window.addEventListener(SETTINGS_EVENT, sync);
    return () => window.removeEventListener(SETTINGS_EVENT, sync);
  }, []);

  const loadProjects = useCallback(async () => {
    setProjectsStatus("Loading…");
    try {
      const data = await callApi<ProjectsResponse>(projectsUrl({ search, category: categoryFilter, sort }));
      setProjects(data.projects ?? []);
      setProjectsStatus("");
    } catch (err) {
      setProjectsStatus(errorMessage(err));
    }
  }, [search, categoryFilter, sort]);

  useEffect(() => {
    if (tab === "projects") void loadProjects();
  }, [tab, loadProjects]);

  // the practice picker ignores the My scripts filters
  const loadPracticeProjects = useCallback(async () => {
    try {
      const data = await callApi<ProjectsResponse>(projectsUrl());
      setPracticeProjects(data.projects ?? []);
    } catch (err) {
      setPracticeStatus(errorMessage(err));
    }
  }, []);

  useEffect(() => {
    if (tab === "practice") void loadPracticeProjects();
  }, [tab, loadPracticeProjects]);

  /* --------------------------------- Create --------------------------------- */

  const inputContent = inputText.trim();
  const canGenerate = Boolean(inputContent) && (inputMethod !== "image" || Boolean(imageDataUrl));

  function patch<T>(setter: React.Dispatch<React.SetStateAction<Partial<Record<ScriptVersion, T>>>>, v: ScriptVersion, value: NoInfer<T> | undefined) {
    setter((prev) => ({ ...prev, [v]: value }));
  }

  async function onImageChange(e: React.ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (!file) return;
    try {
      setImageDataUrl(await readAsDataUrl(file));
      setFileName(file.name);
    } catch (err) {
      patch(setStatus, activeVersion, errorMessage(err));
    }
  }

  async function onTextFileChange(e: React.ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (!file) return;
    try {
      setInputText(await file.text());
      setFileName(file.name);
    } catch (err) {
      patch(setStatus, activeVersion, errorMessage(err));
    }
  }

  function startNewProject() {
    setResults({});
    setStatus({});
    setProjectId(null);
    setDraftId(null);
    setInputText("");
    setImageDataUrl("");
    setFileName("");
    setActiveVersion("original");
  }

  async function generateScript(v: ScriptVersion) {
    if (!canGenerate) {
      patch(setStatus, v, inputMethod === "image" ? "Upload an image and describe it first." : "Enter some content first.");
      return;
    }
    patch(setBusy, v, "script");
    patch(setStatus, v, `Writing the ${VERSION_LABELS[v].toLowerCase()}…`);
    try {
      const data = await callApi<ScriptResponse>(
        "/api/scripts",
        postJson({
          version: v,
          category,
          inputMethod,
          content: inputContent,
          image: inputMethod === "image" ? imageDataUrl : undefined,
          model: settings.model,
          apiKey: settings.apiKey || undefined,
        })
      );
      const result = data.result;
      if (!result) throw new Error("No script returned.");
      patch(setResults, v, result);
      patch(setStatus, v, data.warning ? `Done (note: ${data.warning})` : "Script ready.");
    } catch (err) {
      patch(setStatus, v, errorMessage(err));
    } finally {
      patch(setBusy, v, undefined);
    }
  }

  async function generateAudio(v: ScriptVersion) {
    const result = results[v];
    if (!result) return;
    patch(setBusy, v, "audio");
    patch(setStatus, v, isDialogueVersion(v) ? "Voicing each turn…" : "Voicing the script…");
    try {
      const data = await callApi<AudioResponse>(
        "/api/audio",
        postJson({
          version: v,
          script: result.script,
          draftId: draftId ?? undefined,
          voice1: settings.voice1,
          voice2: settings.voice2,
          apiKey: settings.apiKey || undefined,
        })
      );
      const audio = data.audio;
      if (!audio) throw new Error("No audio returned.");
      if (data.draftId) setDraftId(data.draftId);
      patch(setResults, v, { ...result, audio });
      patch(
        setStatus,
        v,
        audio.kind === "dialogue" && !audio.merged ? "Audio ready (turns only, merge failed)." : "Audio ready."
      );
    } catch (err) {
      patch(setStatus, v, errorMessage(err));
    } finally {
      patch(setBusy, v, undefined);
    }
  }

  async function saveVersion(v: ScriptVersion) {
    const result = results[v];
    if (!result) return;
    patch(setBusy, v, "save");
    patch(setStatus, v, "Saving…");
    try {
      const data = await callApi<SaveResponse>(
        "/api/projects",
        postJson({
          projectId: projectId ?? undefined,
          category,
          inputMethod,
          inputContent: inputMethod === "file" && fileName ? `[${fileName}]\n${inputContent}` : inputContent,
          version: v,
          result,
        })
      );
      if (data.projectId) setProjectId(data.projectId);
      patch(setStatus, v, data.created ? `Saved as a new project (${data.projectId}).` : "Saved into the current project.");
    } catch (err) {
      patch(setStatus, v, errorMessage(err));
    } finally {
      patch(setBusy, v, undefined);
    }
  }

  /* ------------------------------ Projects tab ------------------------------ */

  async function deleteProject(id: string) {
    if (confirmDelete !== id) {
      setConfirmDelete(id);
      return;
    }
    setConfirmDelete(null);
    try {
      await callApi<{ error?: string }>(`/api/projects/${encodeURIComponent(id)}`, { method: "DELETE" });
      if (practiceId === id) {
        setPracticeId("");
        setPractice(null);
      }
      await loadProjects();
    } catch (err) {
      setProjectsStatus(errorMessage(err));
    }
  }

  async function openPractice(id: string) {
    setTab("practice");
    setPracticeId(id);
    if (!id) {
      setPractice(null);
      return;
    }
    setPracticeStatus("Loading project…");
    try {
      const data = await callApi<ProjectResponse>(`/api/projects/${encodeURIComponent(id)}`);
      if (!data.metadata || !data.versions) throw new Error("Project not found.");
      setPractice({ metadata: data.metadata, versions: data.versions });
      setPracticeStatus("");
    } catch (err) {
      setPractice(null);
      setPracticeStatus(errorMessage(err));
    }
  }

  const practiceSheet = useMemo<PracticeSheet | null>(() => {
    if (!practice) return null;
    return {
      title: practice.metadata.title,
      koreanTitle: practice.metadata.koreanTitle,
      category: practice.metadata.category,
      createdAt: practice.metadata.createdAt,
      sections: practiceSections(practice.versions),
    };
  }, [practice]);

  function exportPdf() {
    if (!practiceSheet) return;
    downloadBlob(practicePdfBlob(practiceSheet), sheetFileName(practiceSheet, "pdf"));
  }

  async function exportDocx() {
    if (!practiceSheet) return;
    try {
      downloadBlob(await practiceDocxBlob(practiceSheet), sheetFileName(practiceSheet, "docx"));
    } catch (err) {
      setPracticeStatus(errorMessage(err));
    }
  }

  /* ------------------------------ Settings tab ------------------------------ */

  function storeSettings() {
    saveSettings(draftSettings);
    setSettingsStatus("Settings saved in this browser.");
  }

  async function testVoice(voice: TtsVoice) {
    setSettingsStatus(`Testing ${voice}…`);
    try {
      const res = await fetch("/api/voice-test", postJson({ voice, apiKey: draftSettings.apiKey || undefined }));
      if (!res.ok) {
        const data: { error?: string } = await res.json();
        throw new Error(data?.error || "Voice test failed");
      }
      const url = URL.createObjectURL(await res.blob());
      const player = new Audio(url);
      player.onended = () => URL.revokeObjectURL(url);
      await player.play();
      setSettingsStatus(`Playing ${voice}.`);
    } catch (err) {
      setSettingsStatus(errorMessage(err));
    }
  }

  async function runSystemTest() {
    setSystemStatus("Checking…");
    try {
      setSystem(await callApi<SystemInfo>("/api/system"));
      setSystemStatus("");
    } catch (err) {
      setSystemStatus(errorMessage(err));
    }
  }

  /* --------------------------------- Render --------------------------------- */

  const activeResult = results[activeVersion];
  const activeBusy = busy[activeVersion];
  // one save at a time, so a second save lands in the project the first one created
  const saving = Object.values(busy).includes("save");

  return (
    <main className="min-h-screen bg-slate-950 text-slate-100">
      <div className="mx-auto max-w-5xl px-4 py-8">
        <header className="flex flex-col gap-2">
          <h1 className="text-2xl font-black tracking-tight">Talk Studio</h1>
          <p className="text-slate-300 text-sm">
            English speaking scripts in five styles, with Korean translations and voiced dialogues.
          </p>
        </header>

        <nav className="mt-6 flex flex-wrap gap-2">
          {TABS.map((t) => (
            <button
              key={t.id}
              type="button"
              onClick={() => setTab(t.id)}
              className={`rounded-xl px-4 py-2 font-semibold ${
                tab === t.id ? "bg-sky-500/25 text-sky-100" : "border border-white/10 bg-white/5 hover:bg-white/10"
              }`}
            >
              {t.label}
            </button>
          ))}
        </nav>

        {tab === "create" && (
          <>
            {/* Source */}
            <section className="mt-6 rounded-2xl border border-white/10 bg-white/5 p-4">
              <div className="flex flex-col gap-4">
                <div className="grid gap-3 md:grid-cols-3">
                  <label className="flex flex-col gap-1">
                    <span className="text-xs text-slate-300">Category</span>
                    <select value={category} onChange={(e) => setCategory(e.target.value)} className={inputClass}>
                      {CATEGORIES.map((c) => (
                        <option key={c} value={c}>
                          {c}
                        </option>
                      ))}
                    </select>
                  </label>

                  <label className="flex flex-col gap-1">
                    <span className="text-xs text-slate-300">Input</span>
                    <select
                      value={inputMethod}
                      onChange={(e) =>
                        setInputMethod(pick(INPUT_METHODS.map((m) => m.id), e.target.value, "text"))
                      }
                      className={inputClass}
                    >
                      {INPUT_METHODS.map((m) => (
                        <option key={m.id} value={m.id}>
                          {m.label}
                        </option>
                      ))}
                    </select>
                  </label>

                  <div className="flex items-end">
                    <button type="button" onClick={startNewProject} disabled={saving} className={buttonClass}>
                      New project
                    </button>
                  </div>
                </div>

                {inputMethod === "image" && (
                  <label className="flex flex-col gap-1">
                    <span className="text-xs text-slate-300">Image</span>
                    <input type="file" accept="image/png,image/jpeg,image/webp" onChange={onImageChange} />
                    {imageDataUrl && (
                      <img src={imageDataUrl} alt={fileName} className="mt-2 max-h-48 w-fit rounded-xl" />
                    )}
                  </label>
                )}

                {inputMethod === "file" && (
                  <label className="flex flex-col gap-1">
                    <span className="text-xs text-slate-300">Text file</span>
                    <input type="file" accept=".txt,.md,text/plain,text/markdown" onChange={onTextFileChange} />
                    {fileName && <span className="text-xs text-slate-400">Loaded: {fileName}</span>}
                  </label>
                )}

                <label className="flex flex-col gap-1">
                  <span className="text-xs text-slate-300">
                    {inputMethod === "image" ? "Describe the image" : inputMethod === "file" ? "File content" : "Topic or text"}
                  </span>
                  <textarea
                    value={inputText}
                    onChange={(e) => setInputText(e.target.value)}
                    rows={6}
                    className="rounded-2xl border border-white/10 bg-slate-900 px-3 py-2"
                    placeholder="e.g. Ordering coffee at a busy café downtown"
                  />
                </label>

                {projectId && <div className="text-xs text-slate-400">Saving into project {projectId}</div>}
              </div>
            </section>

            {/* Versions */}
            <section className="mt-6 rounded-2xl border border-white/10 bg-white/5 p-4">
              <div className="flex flex-wrap gap-2">
                {SCRIPT_VERSIONS.map((v) => (
                  <button
                    key={v}
                    type="button"
                    onClick={() => setActiveVersion(v)}
                    className={`rounded-xl px-3 py-2 text-sm font-semibold ${
                      activeVersion === v
                        ? "bg-violet-500/25 text-violet-100"
                        : "border border-white/10 bg-slate-900 hover:bg-slate-800"
                    }`}
                  >
                    {VERSION_LABELS[v]}
                    {results[v] ? " ✓" : ""}
                  </button>
                ))}
              </div>

              <div className="mt-4 flex flex-wrap items-center gap-2">
                <button
                  type="button"
                  disabled={!canGenerate || Boolean(activeBusy)}
                  onClick={() => generateScript(activeVersion)}
                  className="rounded-xl bg-sky-500/20 px-4 py-2 font-semibold text-sky-200 hover:bg-sky-500/25 disabled:opacity-40 disabled:cursor-not-allowed"
                >
                  Generate script
                </button>
                <button
                  type="button"
                  disabled={!activeResult || Boolean(activeBusy)}
                  title={!activeResult ? "Generate the script first" : ""}
                  onClick={() => generateAudio(activeVersion)}
                  className="rounded-xl bg-emerald-500/20 px-4 py-2 font-semibold text-emerald-200 hover:bg-emerald-500/25 disabled:opacity-40 disabled:cursor-not-allowed"
                >
                  Generate audio
                </button>
                <button
                  type="button"
                  disabled={!activeResult || Boolean(activeBusy) || saving}
                  onClick={() => saveVersion(activeVersion)}
                  className={buttonClass}
                >
                  Save
                </button>
                <label className="flex items-center gap-2 text-sm text-slate-300">
                  <input type="checkbox" checked={loop} onChange={(e) => setLoop(e.target.checked)} />
                  Loop playback
                </label>
                <div className="ml-auto text-sm text-slate-300">{status[activeVersion]}</div>
              </div>

              <div className="mt-4">
                {activeResult ? (
                  <ScriptPanel result={activeResult} loop={loop} />
                ) : (
                  <div className="text-sm text-slate-400">No {VERSION_LABELS[activeVersion].toLowerCase()} yet.</div>
                )}
              </div>
            </section>
          </>
        )}

        {tab === "practice" && (
          <section className="mt-6 rounded-2xl border border-white/10 bg-white/5 p-4">
            <div className="flex flex-wrap items-end gap-3">
              <label className="flex flex-col gap-1">
                <span className="text-xs text-slate-300">Project</span>
                <select value={practiceId} onChange={(e) => openPractice(e.target.value)} className={inputClass}>
                  <option value="">Choose a saved project…</option>
                  {practiceProjects.map((p) => (
                    <option key={p.projectId} value={p.projectId}>
                      {p.title} ({p.projectId})
                    </option>
                  ))}
                </select>
              </label>
              <button type="button" disabled={!practiceSheet?.sections.length} onClick={exportPdf} className={buttonClass}>
                Export PDF
              </button>
              <button type="button" disabled={!practiceSheet?.sections.length} onClick={exportDocx} className={buttonClass}>
                Export DOCX
              </button>
              <label className="flex items-center gap-2 text-sm text-slate-300">
                <input type="checkbox" checked={loop} onChange={(e) => setLoop(e.target.checked)} />
                Loop playback
              </label>
              <div className="ml-auto text-sm text-slate-300">{practiceStatus}</div>
            </div>

            {practice && (
              <div className="mt-4 flex flex-col gap-6">
                <div>
                  <div className="text-xl font-black">{practice.metadata.title}</div>
                  <div className="text-sm text-slate-300">
                    {practice.metadata.koreanTitle} · {practice.metadata.category} ·{" "}
                    {practice.metadata.createdAt.slice(0, 10)}
                  </div>
                </div>
                {SCRIPT_VERSIONS.map((v) => {
                  const saved = practice.versions[v];
                  if (!saved?.script) return null;
                  return (
                    <div key={v} className="flex flex-col gap-2">
                      <div className="text-xs font-bold uppercase text-violet-200">{VERSION_LABELS[v]}</div>
                      <ScriptPanel
                        result={{
                          title: saved.title,
                          koreanTitle: saved.koreanTitle ?? "",
                          script: saved.script,
                          translation: saved.translation,
                          audio: saved.audio,
                        }}
                        loop={loop}
                      />
                    </div>
                  );
                })}
              </div>
            )}
          </section>
        )}

        {tab === "projects" && (
          <section className="mt-6 rounded-2xl border border-white/10 bg-white/5 p-4">
            <div className="grid gap-3 md:grid-cols-4">
              <label className="flex flex-col gap-1 md:col-span-2">
                <span className="text-xs text-slate-300">Search</span>
                <input
                  value={search}
                  onChange={(e) => setSearch(e.target.value)}
                  placeholder="Title or input content"
                  className={inputClass}
                />
              </label>
              <label className="flex flex-col gap-1">
                <span className="text-xs text-slate-300">Category</span>
                <select value={categoryFilter} onChange={(e) => setCategoryFilter(e.target.value)} className={inputClass}>
                  <option value="all">All</option>
                  {CATEGORIES.map((c) => (
                    <option key={c} value={c}>
                      {c}
                    </option>
                  ))}
                </select>
              </label>
              <label className="flex flex-col gap-1">
                <span className="text-xs text-slate-300">Sort</span>
                <select
                  value={sort}
                  onChange={(e) => setSort(pick<ProjectSort>(["recent", "title"], e.target.value, "recent"))}
                  className={inputClass}
                >
                  <option value="recent">Most recent</option>
                  <option value="title">Title</option>
                </select>
              </label>
            </div>

            <div className="mt-2 text-sm text-slate-300">{projectsStatus}</div>

            <div className="mt-4 grid gap-3 md:grid-cols-2">
              {projects.map((p) => (
                <div key={p.projectId} className="rounded-2xl border border-white/10 bg-slate-900 p-3">
                  <div className="font-extrabold">{p.title}</div>
                  <div className="text-xs text-slate-400">
                    {p.category} · {p.createdAt.slice(0, 10)} · {p.versions.map((v) => VERSION_LABELS[v]).join(", ")}
                  </div>
                  <div className="mt-2 text-sm text-slate-300">{preview(p.inputContent, 120)}</div>
                  <div className="mt-3 flex gap-2">
                    <button
                      type="button"
                      onClick={() => openPractice(p.projectId)}
                      className="rounded-xl border border-white/10 bg-white/10 px-3 py-2 text-sm font-semibold hover:bg-white/15"
                    >
                      View details
                    </button>
                    <button
                      type="button"
                      onClick={() => deleteProject(p.projectId)}
                      className="rounded-xl bg-rose-500/20 px-3 py-2 text-sm font-semibold text-rose-200 hover:bg-rose-500/25"
                    >
                      {confirmDelete === p.projectId ? "Click again to delete" : "Delete"}
                    </button>
                  </div>
                </div>
              ))}
              {!projects.length && !projectsStatus && (
                <div className="text-sm text-slate-400">No saved scripts yet.</div>
              )}
            </div>
          </section>
        )}

        {tab === "settings" && (
          <section className="mt-6 rounded-2xl border border-white/10 bg-white/5 p-4">
            <div className="grid gap-3 md:grid-cols-2">
              <label className="flex flex-col gap-1 md:col-span-2">
                <span className="text-xs text-slate-300">OpenAI API key (stored in this browser only)</span>
                <input
                  type="password"
                  value={draftSettings.apiKey}
                  onChange={(e) => setDraftSettings({ ...draftSettings, apiKey: e.target.value })}
                  placeholder="Leave empty to use the server key"
                  className={inputClass}
                />
              </label>

              <label className="flex flex-col gap-1">
                <span className="text-xs text-slate-300">Model</span>
                <select
                  value={draftSettings.model}
                  onChange={(e) =>
                    setDraftSettings({ ...draftSettings, model: pick(CHAT_MODELS, e.target.value, "gpt-4o-mini") })
                  }
                  className={inputClass}
                >
                  {CHAT_MODELS.map((m) => (
                    <option key={m} value={m}>
                      {m}
                    </option>
                  ))}
                </select>
              </label>
              <div />

              {(["voice1", "voice2"] as const).map((slot) => (
                <label key={slot} className="flex flex-col gap-1">
                  <span className="text-xs text-slate-300">{slot === "voice1" ? "Voice 1" : "Voice 2"}</span>
                  <div className="flex gap-2">
                    <select
                      value={draftSettings[slot]}
                      onChange={(e) => {
                        const voice = pick(
                          TTS_VOICES.map((v) => v.id),
                          e.target.value,
                          defaultSettings[slot]
                        );
                        setDraftSettings(
                          slot === "voice1" ? { ...draftSettings, voice1: voice } : { ...draftSettings, voice2: voice }
                        );
                      }}
                      className={`${inputClass} w-full`}
                    >
                      {TTS_VOICES.map((v) => (
                        <option key={v.id} value={v.id}>
                          {v.label}
                        </option>
                      ))}
                    </select>
                    <button type="button" onClick={() => testVoice(draftSettings[slot])} className={buttonClass}>
                      Test
                    </button>
                  </div>
                </label>
              ))}
            </div>

            <div className="mt-4 rounded-2xl border border-white/10 bg-slate-900 p-3 text-sm">
              <div className="text-xs font-bold text-slate-300">VOICE ASSIGNMENT</div>
              <table className="mt-2 w-full text-left">
                <tbody>
                  <tr>
                    <td className="py-1 text-slate-400">Original · Basic</td>
                    <td>Voice 1 ({draftSettings.voice1})</td>
                  </tr>
                  <tr>
                    <td className="py-1 text-slate-400">TED talk</td>
                    <td>Voice 2 ({draftSettings.voice2})</td>
                  </tr>
                  <tr>
                    <td className="py-1 text-slate-400">Podcast</td>
                    <td>
                      Host: {draftSettings.voice1} · Guest: {draftSettings.voice2}
                    </td>
                  </tr>
                  <tr>
                    <td className="py-1 text-slate-400">Daily dialogue</td>
                    <td>
                      A: {draftSettings.voice1} · B: {draftSettings.voice2}
                    </td>
                  </tr>
                </tbody>
              </table>
            </div>

            <div className="mt-4 flex flex-wrap items-center gap-2">
              <button
                type="button"
                onClick={storeSettings}
                className="rounded-xl bg-sky-500/20 px-4 py-2 font-semibold text-sky-200 hover:bg-sky-500/25"
              >
                Save settings
              </button>
              <button type="button" onClick={runSystemTest} className={buttonClass}>
                System test
              </button>
              <div className="ml-auto text-sm text-slate-300">{settingsStatus || systemStatus}</div>
            </div>

            {system && (
              <div className="mt-4 rounded-2xl border border-white/10 bg-slate-900 p-3 text-sm">
                <div className="text-xs font-bold text-slate-300">SYSTEM</div>
                <ul className="mt-2 space-y-1">
                  <li>Server API key: {system.apiKeyOnServer ? "set" : "not set"}</li>
                  <li>
                    Models: {system.chatModel} (default) · {system.ttsModel}
                  </li>
                  <li>
                    ffmpeg ({system.ffmpeg.binary}):{" "}
                    {system.ffmpeg.available ? `available ${system.ffmpeg.version ?? ""}` : "not found, using fallback"}
                  </li>
                  <li>
                    Fallback merge: {system.fallback.decoder}, {system.fallback.silenceMs} ms pauses
                  </li>
                  <li>
                    Storage: {system.storage.dataDir} · {system.storage.writable ? "writable" : `not writable (${system.storage.error ?? "unknown"})`} ·{" "}
                    {system.storage.projects} projects
                  </li>
                  <li>Node {system.node}</li>
                </ul>
              </div>
            )}
          </section>
        )}
      </div>
    </main>
  );
}
