/**
 * PDF text extraction with a size-keyed JSON cache.
 *
 * Every extracted line is prefixed with its page tag (`[Page 3] ...`) so the
 * search synthesizer can recover the page of a match and link straight to it.
 *
 * Cache file `pdf-text-cache.json` lives beside the index file:
 *   { "version": 1, "entries": { "<abs path>": { pdfSize, extractedAt, text, pageCount } } }
 * An entry is reused while the PDF keeps the same byte size.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";

export const PDF_CACHE_FILE = "pdf-text-cache.json";

export interface PdfCacheEntry {
  pdfSize: number;
  extractedAt: string;
  text: string;
  pageCount: number;
}

interface PdfCacheStore {
  version: number;
  entries: Record<string, PdfCacheEntry>;
}

/** Prefix each line of each page with `[Page N] `. */
export function tagPages(pages: readonly { num: number; text: string }[]): string {
  const parts: string[] = [];
  for (const page of pages) {
    for (const line of page.text.split("\n")) parts.push(`[Page ${page.num}] ${line}`);
  }
  return parts.join("\n");
}

export class PdfExtractor {
  public readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheDir Directory holding the cache file (the index file's directory).
   */
  public constructor(cacheDir: string, verbose = false) {
    this.cacheFilePath = path.join(cacheDir, PDF_CACHE_FILE);
    this.verbose = verbose;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    let store: PdfCacheStore = { version: 1, entries: {} };
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.cacheFilePath, "utf8"));
      if (parsed && typeof parsed === "object" && "entries" in parsed) {
        const { entries } = parsed;
        if (entries && typeof entries === "object") store = { version: 1, entries: { ...entries } };
      }
    } catch {
      // Missing or corrupt cache: start fresh.
    }
    this.cacheStore = store;
    return store;
  }

  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }

  /**
   * Page-tagged text of a PDF, from cache when the size still matches.
   * Extraction failures are logged and yield "" so indexing can continue.
   */
  public async extractText(pdfAbsPath: string, pdfSize: number): Promise<string> {
    const store = await this.loadCacheStore();
    const cached = store.entries[pdfAbsPath];
    if (cached && cached.pdfSize === pdfSize && cached.text) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return cached.text;
    }

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(pdfAbsPath)}...`);
    try {
      const parser = new PDFParse({ data: await fs.readFile(pdfAbsPath) });
      try {
        const result = await parser.getText();
        const text = tagPages(result.pages);
        store.entries[pdfAbsPath] = {
          pdfSize,
          extractedAt: new Date().toISOString(),
          text,
          pageCount: result.pages.length,
        };
        await this.saveCacheStore(store);
        return text;
      } finally {
        await parser.destroy();
      }
    } catch (e) {
      console.error(`[PDF] Failed to extract text from ${path.basename(pdfAbsPath)}:`, e);
      return "";
    }
  }

  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
