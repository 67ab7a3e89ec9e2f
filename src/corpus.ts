import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { extractDocxText, isDocx } from "./docx-extractor";
import { PdfExtractor } from "./pdf-extractor";
import { statusManager } from "./status";
import type { CorpusSource, DocRecord } from "./types";

export interface FileCorpusOptions {
  dataDir: string;
  /** Extensions without leading dot, searched in this order. */
  allowedExt: string[];
  /** Folder names pruned anywhere in the tree. */
  excludedFolders?: string[];
  /** Absolute paths never indexed (the index file itself, extraction caches). */
  excludeFiles?: string[];
  /** Where the PDF extraction cache lives (default: dataDir). */
  cacheDir?: string;
  verbose?: boolean;
}

/**
 * Corpus backed by a directory tree. Document ids are absolute paths; files
 * are discovered one extension pattern at a time so ordering is stable.
 */
export class FileCorpus implements CorpusSource {
  private readonly dataDir: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly excludeFiles: Set<string>;
  private readonly pdf: PdfExtractor;
  private readonly verbose: boolean;

  public constructor(opts: FileCorpusOptions) {
    this.dataDir = path.resolve(opts.dataDir);
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders ?? [];
    this.pdf = new PdfExtractor(opts.cacheDir ?? this.dataDir, opts.verbose);
    this.excludeFiles = new Set([...(opts.excludeFiles ?? []), this.pdf.cacheFilePath].map((p) => path.resolve(p)));
    this.verbose = !!opts.verbose;
  }

  /** Absolute paths of matching files, first-seen order, duplicates removed. */
  public async discoverFiles(): Promise<string[]> {
    const ignore = this.excludedFolders.map((f) => `**/${f}/**`);
    const found: string[] = [];
    for (const ext of this.allowedExt) {
      const matches = await fg(`**/*.${ext}`, {
        cwd: this.dataDir,
        absolute: true,
        onlyFiles: true,
        caseSensitiveMatch: false,
        ignore,
      });
      found.push(...matches.sort().map((m) => path.resolve(m)));
    }
    return [...new Set(found)].filter((p) => !this.excludeFiles.has(p));
  }

  public async load(): Promise<DocRecord[]> {
    const files = await this.discoverFiles();
    statusManager.setFilesDiscovered(files.length);
    console.error(`[RAG] Loading files from ${this.dataDir} ... (${files.length} files)`);

    const docs: DocRecord[] = [];
    for (const file of files) {
      try {
        const text = await this.readText(file);
        if (text) docs.push({ id: file, text });
        else if (this.verbose) console.error(`[RAG][verbose] Skipping empty file ${file}`);
      } catch (e) {
        console.error(`[RAG] Skipping unreadable file ${file}:`, e);
      }
    }
    return docs;
  }

  private async readText(file: string): Promise<string> {
    if (PdfExtractor.isPdf(file)) {
      const st = await fs.stat(file);
      return this.pdf.extractText(file, st.size);
    }
    if (isDocx(file)) return extractDocxText(file);
    return (await fs.readFile(file, "utf8")).trim();
  }
}
