/**
 * Strip the markup a generated script carries before it is spoken:
 * [stage directions], **labels**, *emphasis* and markdown headings.
 */
export function cleanSpeechText(text: string): string {
  return text
    .replace(/\[.*?\]/g, "")
    .replace(/\*\*.*?\*\*/g, "")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/^#+\s*/gm, "")
    .replace(/[\r\n]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function slugify(input: string) {
  return input
    .trim()
    .toLowerCase()
    .replace(/['"]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/(^-|-$)/g, "")
    .slice(0, 70);
}

export function preview(text: string, max = 200) {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
