import jsPDF from "jspdf";
import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { slugify } from "./text";
import type { ScriptVersion } from "./types";
import { SCRIPT_VERSIONS, VERSION_LABELS } from "./versions";

export type PracticeSection = {
  version: ScriptVersion;
  label: string;
  title: string;
  koreanTitle?: string;
  script: string;
  translation?: string;
};

export type PracticeSheet = {
  title: string;
  koreanTitle?: string;
  category: string;
  createdAt: string;
  sections: PracticeSection[];
};

type SheetVersion = {
  title: string;
  koreanTitle?: string;
  script?: string;
  translation?: string;
};

/** Versions in display order; versions without a script are left out. */
export function practiceSections(versions: Partial<Record<ScriptVersion, SheetVersion>>): PracticeSection[] {
  const sections: PracticeSection[] = [];
  for (const version of SCRIPT_VERSIONS) {
    const v = versions[version];
    if (!v?.script?.trim()) continue;
    sections.push({
      version,
      label: VERSION_LABELS[version],
      title: v.title,
      koreanTitle: v.koreanTitle,
      script: v.script.trim(),
      translation: v.translation?.trim() || undefined,
    });
  }
  return sections;
}

export function sheetFileName(sheet: Pick<PracticeSheet, "title">, ext: "pdf" | "docx") {
  const slug = slugify(sheet.title) || "practice";
  return `${slug}-practice.${ext}`;
}

function scriptLines(text: string): string[] {
  return text
    .split(/\n+/)
    .map((l) => l.trim())
    .filter(Boolean);
}

/* ----------------------------------- PDF ----------------------------------- */

function pdfAddWrapped(doc: jsPDF, text: string, x: number, y: number, maxWidth: number, lineHeight: number) {
  const lines: string[] = doc.splitTextToSize(text, maxWidth);
  doc.text(lines, x, y);
  return y + lines.length * lineHeight;
}

/**
 * English only: the built-in PDF fonts have no Hangul glyphs, so Korean
 * belongs in the DOCX sheet.
 */
export function buildPracticePdf(sheet: PracticeSheet): jsPDF {
  const doc = new jsPDF({ unit: "mm", format: "a4" });
  const margin = 14;
  const lh = 5;
  const pageW = doc.internal.pageSize.getWidth();
  const pageH = doc.internal.pageSize.getHeight();
  const maxW = pageW - margin * 2;

  let y = margin;
  const ensureSpace = (needed: number) => {
    if (y + needed > pageH - margin) {
      doc.addPage();
      y = margin;
    }
  };

  doc.setFontSize(16);
  y = pdfAddWrapped(doc, `Speaking practice: ${sheet.title}`, margin, y, maxW, 7);
  doc.setFontSize(10);
  doc.text(`${sheet.category} | ${sheet.createdAt.slice(0, 10)}`, margin, y);
  y += 8;

  for (const section of sheet.sections) {
    ensureSpace(20);
    doc.setDrawColor(180);
    doc.line(margin, y - 4, pageW - margin, y - 4);

    doc.setFontSize(12);
    doc.setFont("helvetica", "bold");
    y = pdfAddWrapped(doc, `${section.label}: ${section.title}`, margin, y, maxW, 6);
    doc.setFont("helvetica", "normal");
    doc.setFontSize(10);
    y += 1;

    for (const line of scriptLines(section.script)) {
      const height = doc.splitTextToSize(line, maxW).length * lh;
      ensureSpace(height);
      y = pdfAddWrapped(doc, line, margin, y, maxW, lh);
      y += 1.5;
    }
    y += 6;
  }

  return doc;
}

export function practicePdfBlob(sheet: PracticeSheet): Blob {
  return buildPracticePdf(sheet).output("blob");
}

/* ----------------------------------- DOCX ---------------------------------- */

function mmToTwip(mm: number) {
  return Math.round((mm / 25.4) * 1440);
}

export function buildPracticeDocx(sheet: PracticeSheet): Document {
  const marginMm = 16;
  const body = (text: string, opts: { italics?: boolean; color?: string } = {}) =>
    new Paragraph({
      spacing: { after: 120, line: 300, lineRule: "auto" },
      children: [new TextRun({ text, size: 22, font: "Calibri", ...opts })],
    });

  const children: Paragraph[] = [
    new Paragraph({
      heading: HeadingLevel.TITLE,
      spacing: { after: 120 },
      children: [new TextRun({ text: sheet.title, bold: true, size: 34, font: "Calibri" })],
    }),
  ];
  if (sheet.koreanTitle) {
    children.push(
      new Paragraph({
        spacing: { after: 120 },
        children: [new TextRun({ text: sheet.koreanTitle, size: 24, font: "Malgun Gothic" })],
      })
    );
  }
  children.push(body(`${sheet.category} | ${sheet.createdAt.slice(0, 10)}`, { color: "666666" }));

  for (const section of sheet.sections) {
    children.push(
      new Paragraph({
        heading: HeadingLevel.HEADING_1,
        spacing: { before: 320, after: 120 },
        children: [new TextRun({ text: `${section.label}: ${section.title}`, bold: true, size: 28, font: "Calibri" })],
      })
    );
    if (section.koreanTitle) children.push(body(section.koreanTitle, { color: "666666" }));

    children.push(...scriptLines(section.script).map((line) => body(line)));

    if (section.translation) {
      children.push(
        new Paragraph({
          heading: HeadingLevel.HEADING_2,
          spacing: { before: 200, after: 100 },
          children: [new TextRun({ text: "Korean translation", bold: true, size: 24, font: "Calibri" })],
        })
      );
      children.push(...scriptLines(section.translation).map((line) => body(line, { italics: true })));
    }
  }

  return new Document({
    sections: [
      {
        properties: {
          page: {
            margin: {
              top: mmToTwip(marginMm),
              bottom: mmToTwip(marginMm),
              left: mmToTwip(marginMm),
              right: mmToTwip(marginMm),
            },
          },
        },
        children,
      },
    ],
  });
}

export function practiceDocxBlob(sheet: PracticeSheet): Promise<Blob> {
  return Packer.toBlob(buildPracticeDocx(sheet));
}

export function downloadBlob(blob: Blob, filename: string) {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  setTimeout(() => URL.revokeObjectURL(url), 4000);
}
