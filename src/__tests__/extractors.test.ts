import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { extractDocxText, isDocx } from "../docx-extractor";
import { PDF_CACHE_FILE, PdfExtractor } from "../pdf-extractor";
import { makeTempDir, type TempDir } from "./helpers";

const calls = vi.hoisted(() => ({ pdf: 0 }));

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    private readonly body: string;

    public constructor(opts: { data: Buffer }) {
      this.body = opts.data.toString("utf8");
    }

    public async getText() {
      calls.pdf++;
      if (this.body === "broken") throw new Error("bad xref table");
      return {
        pages: [
          { num: 1, text: "Hello\nWorld" },
          { num: 2, text: this.body },
        ],
      };
    }

    public async destroy() {}
  },
}));

vi.mock("mammoth", () => ({
  default: {
    extractRawText: async ({ path: file }: { path: string }) => {
      if (file.endsWith("broken.docx")) throw new Error("not a zip file");
      return { value: "Title\n\nFirst paragraph\n", messages: [] };
    },
  },
}));

describe("PdfExtractor", () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await makeTempDir();
    calls.pdf = 0;
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it("tags pages and reuses cached text while the size is unchanged", async () => {
    const file = path.join(tmp.dir, "manual.pdf");
    await fs.writeFile(file, "End");
    const extractor = new PdfExtractor(tmp.dir);

    const expected = "[Page 1] Hello\n[Page 1] World\n[Page 2] End";
    expect(await extractor.extractText(file, 3)).toBe(expected);
    expect(await extractor.extractText(file, 3)).toBe(expected);
    expect(calls.pdf).toBe(1);

    const cache: unknown = JSON.parse(await fs.readFile(path.join(tmp.dir, PDF_CACHE_FILE), "utf8"));
    expect(cache).toMatchObject({ version: 1, entries: { [file]: { pdfSize: 3, text: expected, pageCount: 2 } } });

    // A fresh extractor reads the persisted cache.
    expect(await new PdfExtractor(tmp.dir).extractText(file, 3)).toBe(expected);
    expect(calls.pdf).toBe(1);
  });

  it("re-extracts when the size changes", async () => {
    const file = path.join(tmp.dir, "manual.pdf");
    await fs.writeFile(file, "End");
    const extractor = new PdfExtractor(tmp.dir);
    await extractor.extractText(file, 3);
    await fs.writeFile(file, "Fin!");
    expect(await extractor.extractText(file, 4)).toBe("[Page 1] Hello\n[Page 1] World\n[Page 2] Fin!");
    expect(calls.pdf).toBe(2);
  });

  it("yields empty text for unreadable PDFs", async () => {
    const file = path.join(tmp.dir, "broken.pdf");
    await fs.writeFile(file, "broken");
    expect(await new PdfExtractor(tmp.dir).extractText(file, 6)).toBe("");
  });

  it("recognizes PDFs by extension", () => {
    expect(PdfExtractor.isPdf("/a/B.PDF")).toBe(true);
    expect(PdfExtractor.isPdf("/a/b.txt")).toBe(false);
  });
});

describe("extractDocxText", () => {
  it("tags paragraphs", async () => {
    expect(await extractDocxText("/docs/report.docx")).toBe("[Para 1] Title\n[Para 2] First paragraph");
  });

  it("yields empty text for unreadable documents", async () => {
    expect(await extractDocxText("/docs/broken.docx")).toBe("");
  });

  it("recognizes Word documents by extension", () => {
    expect(isDocx("report.DOCX")).toBe(true);
    expect(isDocx("report.doc")).toBe(false);
  });
});
