import { Packer } from "docx";
import { describe, expect, it } from "vitest";
import { buildPracticeDocx, buildPracticePdf, practiceSections, sheetFileName, type PracticeSheet } from "./exports";

describe("practiceSections", () => {
  it("orders versions and leaves out the ones without a script", () => {
    const sections = practiceSections({
      dialog: { title: "At the Bakery", script: "A: Hi.\nB: Hello.\n", translation: " A: 안녕.\nB: 안녕하세요. " },
      ted: { title: "Unused", script: "   " },
      original: { title: "Bread", koreanTitle: "빵", script: "I bake bread." },
    });

    expect(sections).toEqual([
      {
        version: "original",
        label: "Original script",
        title: "Bread",
        koreanTitle: "빵",
        script: "I bake bread.",
        translation: undefined,
      },
      {
        version: "dialog",
        label: "Daily dialogue",
        title: "At the Bakery",
        koreanTitle: undefined,
        script: "A: Hi.\nB: Hello.",
        translation: "A: 안녕.\nB: 안녕하세요.",
      },
    ]);
  });
});

describe("sheetFileName", () => {
  it("slugs the title", () => {
    expect(sheetFileName({ title: "At the Bakery!" }, "pdf")).toBe("at-the-bakery-practice.pdf");
    expect(sheetFileName({ title: "빵집" }, "docx")).toBe("practice-practice.docx");
  });
});

const sheet: PracticeSheet = {
  title: "At the Bakery",
  koreanTitle: "빵집에서",
  category: "Travel",
  createdAt: "2024-03-05T09:07:03.000Z",
  sections: practiceSections({
    dialog: { title: "At the Bakery", script: "A: Hi.\nB: Hello.", translation: "A: 안녕.\nB: 안녕하세요." },
  }),
};

describe("practice sheet documents", () => {
  it("builds a one-page PDF", () => {
    const doc = buildPracticePdf(sheet);
    expect(doc.getNumberOfPages()).toBe(1);
    expect(Buffer.from(doc.output("arraybuffer")).subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("adds pages for long scripts", () => {
    const long = Array.from({ length: 120 }, (_, i) => `A: Line number ${i + 1}.`).join("\n");
    const doc = buildPracticePdf({ ...sheet, sections: practiceSections({ dialog: { title: "Long", script: long } }) });
    expect(doc.getNumberOfPages()).toBeGreaterThan(1);
  });

  it("packs a DOCX archive", async () => {
    const buffer = await Packer.toBuffer(buildPracticeDocx(sheet));
    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
