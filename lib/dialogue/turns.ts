import { cleanSpeechText } from "../text";
import type { DialogueFormat, SpeakerRole, Turn } from "../types";
import { DIALOGUE_ROLES } from "../versions";

const SHORT_MARKERS: Record<DialogueFormat, Array<[prefix: string, role: SpeakerRole]>> = {
  podcast: [
    ["host:", "host"],
    ["guest:", "guest"],
  ],
  dialog: [
    ["a:", "a"],
    ["b:", "b"],
  ],
};

function normalizeLabel(label: string) {
  return label
    .replace(/[*_#>`-]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

function roleFromLabel(format: DialogueFormat, label: string): SpeakerRole | null {
  if (format === "podcast") {
    // host synonyms win: "Host / Interviewer" is still the host
    if (/host|presenter|interviewer/.test(label)) return "host";
    if (/guest|interviewee|speaker/.test(label)) return "guest";
    return null;
  }

  const m = label.match(/^(?:(?:person|speaker)\s+)?([ab])(?:\s*\(.*\))?$/);
  if (!m) return null;
  return m[1] === "a" ? "a" : "b";
}

function splitMarker(format: DialogueFormat, line: string): { role: SpeakerRole; content: string } | null {
  const lower = line.toLowerCase();
  for (const [prefix, role] of SHORT_MARKERS[format]) {
    if (lower.startsWith(prefix)) return { role, content: line.slice(prefix.length) };
  }

  const colon = line.indexOf(":");
  if (colon === -1) return null;

  const role = roleFromLabel(format, normalizeLabel(line.slice(0, colon)));
  if (!role) return null;
  return { role, content: line.slice(colon + 1) };
}

function makeTurn(role: SpeakerRole, text: string, order: number): Turn {
  return Object.freeze({ role, text, order });
}

/**
 * Split speaker-tagged dialogue into ordered turns. Lines that carry no
 * recognised speaker are ignored; when none carries one, the whole text
 * becomes a single turn for the first speaker.
 */
export function extractTurns(text: string, format: DialogueFormat): Turn[] {
  const turns: Turn[] = [];

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const marked = splitMarker(format, line);
    if (!marked) continue;

    // "**Host:** Hi" leaves the closing emphasis in front of the utterance
    const content = cleanSpeechText(marked.content.replace(/^\s*[*_]+(?=\s|$)/, ""));
    if (!content) continue;

    turns.push(makeTurn(marked.role, content, turns.length));
  }

  if (turns.length === 0) {
    const whole = cleanSpeechText(text);
    if (whole) turns.push(makeTurn(DIALOGUE_ROLES[format][0], whole, 0));
  }

  return turns;
}

export function groupByRole(turns: readonly Turn[]): Partial<Record<SpeakerRole, string>> {
  const joined: Partial<Record<SpeakerRole, string>> = {};
  for (const t of turns) {
    const prev = joined[t.role];
    joined[t.role] = prev ? `${prev} ${t.text}` : t.text;
  }
  return joined;
}
